import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { newEnforcer, type Enforcer } from 'casbin';
import type { PolicyConfig } from '../config/schema.js';
import { getLogger } from '../logger/index.js';

/** 包内自带的 casbin 模型文件。 */
export const DEFAULT_MODEL_PATH = fileURLToPath(new URL('../../config/policy-model.conf', import.meta.url));

/** createPolicyEnforcer 选项。 */
export interface PolicyEnforcerOptions {
  /** casbin 模型文件路径，默认使用包内模型。 */
  modelPath?: string;
  /** CSV 策略文件路径；不传或文件不存在时使用纯内存策略。 */
  policyPath?: string;
}

/**
 * 创建 casbin enforcer。
 *
 * 自动保存关闭：规则变更只在内存中生效，需要持久化时调用 savePolicy()。
 *
 * @param options - 模型与策略文件路径。
 * @returns casbin Enforcer，可直接作为 RuleStore 使用。
 */
export async function createPolicyEnforcer(options: PolicyEnforcerOptions = {}): Promise<Enforcer> {
  const modelPath = options.modelPath ?? DEFAULT_MODEL_PATH;
  const policyPath = options.policyPath;

  const enforcer = policyPath && existsSync(policyPath)
    ? await newEnforcer(modelPath, policyPath)
    : await newEnforcer(modelPath);
  enforcer.enableAutoSave(false);

  getLogger().debug({ modelPath, policyPath }, 'Policy enforcer created');
  return enforcer;
}

/**
 * 按配置创建 enforcer。
 *
 * @param config - 策略配置（路径已解析为绝对路径）。
 * @returns casbin Enforcer。
 */
export function createEnforcerFromConfig(config: PolicyConfig): Promise<Enforcer> {
  return createPolicyEnforcer({ modelPath: config.modelPath, policyPath: config.policyPath });
}

