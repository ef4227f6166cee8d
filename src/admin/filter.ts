import type { OptionLabels } from '../config/schema.js';
import { getLogger } from '../logger/index.js';
import { enforcePermission } from '../policy/codec.js';
import type { RuleStore } from '../policy/types.js';
import { CapabilityTreeCache, getAdminActionOptions } from './options.js';
import type { AdminNode, CapabilityOption } from './types.js';

/** 默认的超级管理员主体。 */
export const DEFAULT_ROOT_SUBJECT = 'u:root';

/**
 * 过滤权限树，包含子选项。
 *
 * 未通过 predicate 的节点连同子树一起移除；通过的节点浅拷贝后再递归过滤其子节点，
 * 即使子节点全部被移除，节点本身仍保留。不会修改输入树。
 *
 * @param options - 权限树。
 * @param predicate - 节点保留条件。
 * @returns 过滤后的新树。
 */
export function filterOptions(
  options: readonly CapabilityOption[],
  predicate: (option: CapabilityOption) => boolean,
): CapabilityOption[] {
  const result: CapabilityOption[] = [];
  for (const option of options) {
    if (!predicate(option)) {
      continue;
    }
    const copy: CapabilityOption = { ...option };
    if (option.children && option.children.length > 0) {
      copy.children = filterOptions(option.children, predicate);
    } else if (option.children) {
      copy.children = [];
    }
    result.push(copy);
  }
  return result;
}

/**
 * 收集权限树中所有节点的权限键（先序，去重）。
 *
 * @param options - 权限树。
 * @returns 权限键集合。
 */
export function collectOptionValues(options: readonly CapabilityOption[]): Set<string> {
  const values = new Set<string>();
  const walk = (items: readonly CapabilityOption[]): void => {
    for (const item of items) {
      values.add(item.value);
      if (item.children) {
        walk(item.children);
      }
    }
  };
  walk(options);
  return values;
}

/** getAdminActionOptionsBySubject 选项。 */
export interface SubjectOptionsParams {
  /** 拥有全部权限的主体，默认 u:root。 */
  rootSubject?: string;
  /** 权限树缓存，默认使用进程级缓存。 */
  cache?: CapabilityTreeCache;
  /** 未传 cache 时使用的固定动作显示名称。 */
  labels?: OptionLabels;
}

/**
 * 获取指定主体有权访问的权限树。
 *
 * enforce 是异步的，因此先并发评估树中全部权限键，
 * 再用结果集合做同步过滤。
 *
 * @param store - 规则存储。
 * @param subject - 主体。
 * @param root - 站点根节点。
 * @param params - 选项。
 * @returns 过滤后的权限树。
 */
export async function getAdminActionOptionsBySubject(
  store: RuleStore,
  subject: string,
  root: AdminNode,
  params: SubjectOptionsParams = {},
): Promise<CapabilityOption[]> {
  const options = params.cache ? params.cache.get(root) : getAdminActionOptions(root, params.labels);
  if (subject === (params.rootSubject ?? DEFAULT_ROOT_SUBJECT)) {
    return filterOptions(options, () => true);
  }

  const values = [...collectOptionValues(options)];
  const results = await Promise.all(values.map((value) => enforcePermission(store, subject, value)));
  const allowed = new Set(values.filter((_, index) => results[index]));

  getLogger().debug(
    { subject, checked: values.length, allowed: allowed.size },
    'Filtered admin options by subject',
  );

  return filterOptions(options, (option) => allowed.has(option.value));
}
