#!/usr/bin/env node

import { existsSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { Command } from 'commander';
import type { Enforcer } from 'casbin';
import { loadConfig } from './config/index.js';
import type { AppConfig } from './config/schema.js';
import { createLogger, getLogger } from './logger/index.js';
import { CapabilityTreeCache } from './admin/options.js';
import { getAdminActionOptionsBySubject } from './admin/filter.js';
import { loadAdminSite } from './admin/static-site.js';
import { enforcePermission } from './policy/codec.js';
import { createEnforcerFromConfig } from './policy/enforcer.js';
import { syncAdminGrouping } from './policy/grouping.js';
import { getSubjectPermissions, updateSubjectRoles } from './policy/subject.js';
import { ensureDir, writeJsonFile } from './utils/file.js';

/**
 * 初始化运行环境（配置 + 日志 + enforcer）。
 *
 * 策略文件不存在时创建空文件，保证写操作可以落盘。
 *
 * @param dataDir - CLI 指定的数据目录，优先于 yaml 配置。
 * @returns 配置与 enforcer。
 */
async function initEnv(dataDir?: string): Promise<{ config: AppConfig; enforcer: Enforcer }> {
  const config = loadConfig({ dataDir });
  createLogger(config.logging);
  if (!existsSync(config.policy.policyPath)) {
    ensureDir(dirname(config.policy.policyPath));
    writeFileSync(config.policy.policyPath, '', 'utf-8');
  }
  const enforcer = await createEnforcerFromConfig(config.policy);
  return { config, enforcer };
}

/**
 * 执行子命令，出错时打印错误并以非零状态退出。
 *
 * @param task - 子命令逻辑。
 */
async function run(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('admin-policy')
  .description('Admin page/action permission policy tool')
  .version('0.1.0')
  .option('-d, --data-dir <path>', 'Data directory path (holds config.yaml and policy.csv)');

program
  .command('enforce')
  .description('Evaluate a permission key for a subject')
  .argument('<subject>', 'Subject, e.g. u:alice or r:editor')
  .argument('<permission>', 'Permission key, e.g. users#admin:list#page')
  .action((subject: string, permission: string) => run(async () => {
    const { enforcer } = await initEnv(program.opts().dataDir);
    const allowed = await enforcePermission(enforcer, subject, permission);
    console.log(allowed ? 'allow' : 'deny');
  }));

program
  .command('permissions')
  .description('List page permissions of a subject')
  .argument('<subject>', 'Subject')
  .option('-i, --implicit', 'Include permissions inherited through roles')
  .action((subject: string, opts: { implicit?: boolean }) => run(async () => {
    const { enforcer } = await initEnv(program.opts().dataDir);
    const permissions = await getSubjectPermissions(enforcer, subject, { implicit: opts.implicit });
    if (permissions.length === 0) {
      console.log('No permissions found.');
      return;
    }
    for (const permission of permissions) {
      console.log(permission);
    }
  }));

program
  .command('roles')
  .description('Replace the roles of a subject')
  .argument('<subject>', 'Subject')
  .argument('[roleKeys]', 'Comma-separated role keys, e.g. admin,editor', '')
  .action((subject: string, roleKeys: string) => run(async () => {
    const { enforcer } = await initEnv(program.opts().dataDir);
    const roles = await updateSubjectRoles(enforcer, subject, roleKeys);
    await enforcer.savePolicy();
    console.log(roles.length > 0 ? `Roles set: ${roles.join(', ')}` : 'All roles removed.');
  }));

program
  .command('options')
  .description('Print the permission option tree of an admin site')
  .argument('<site>', 'Admin site JSON file')
  .option('-s, --subject <subject>', 'Only keep options the subject may access')
  .option('-o, --out <file>', 'Write the tree to a JSON file instead of stdout')
  .action((site: string, opts: { subject?: string; out?: string }) => run(async () => {
    const { config, enforcer } = await initEnv(program.opts().dataDir);
    const root = loadAdminSite(site);
    const cache = new CapabilityTreeCache(config.policy.labels);
    const options = opts.subject
      ? await getAdminActionOptionsBySubject(enforcer, opts.subject, root, {
        rootSubject: config.policy.rootSubject,
        cache,
      })
      : cache.get(root);
    if (opts.out) {
      writeJsonFile(opts.out, options);
      getLogger().info({ out: opts.out }, 'Option tree written');
      return;
    }
    console.log(JSON.stringify(options, null, 2));
  }));

program
  .command('sync-grouping')
  .description('Synchronize admin resource parent/child relations into the policy')
  .argument('<site>', 'Admin site JSON file')
  .action((site: string) => run(async () => {
    const { config, enforcer } = await initEnv(program.opts().dataDir);
    const result = await syncAdminGrouping(enforcer, loadAdminSite(site), config.policy.resourceGroupingType);
    await enforcer.savePolicy();
    console.log(`Grouping synchronized: ${result.removed} removed, ${result.added} added.`);
  }));

await program.parseAsync(process.argv);
