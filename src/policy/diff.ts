import { getLogger } from '../logger/index.js';
import type { DiffResult, RuleStore } from './types.js';

/**
 * 规则的集合身份键。
 *
 * @param rule - 规则字段。
 * @returns 可用于 Set/Map 的字符串键。
 */
export function ruleKey(rule: readonly string[]): string {
  return JSON.stringify(rule);
}

/**
 * 计算新旧两个集合的差异：remove = old - new，add = new - old。
 *
 * 结果保持输入顺序，且 remove 与 add 不相交。
 *
 * @param oldItems - 当前集合。
 * @param newItems - 目标集合。
 * @param keyOf - 元素身份键，默认 String()。
 * @returns 需删除与需添加的元素。
 */
export function computeDiff<T>(
  oldItems: Iterable<T>,
  newItems: Iterable<T>,
  keyOf: (item: T) => string = String,
): DiffResult<T> {
  const oldMap = new Map<string, T>();
  for (const item of oldItems) {
    oldMap.set(keyOf(item), item);
  }
  const newMap = new Map<string, T>();
  for (const item of newItems) {
    newMap.set(keyOf(item), item);
  }

  const remove = [...oldMap].filter(([key]) => !newMap.has(key)).map(([, item]) => item);
  const add = [...newMap].filter(([key]) => !oldMap.has(key)).map(([, item]) => item);
  return { remove, add };
}

/**
 * 计算规则集合差异。
 *
 * @param oldRules - 存储中的规则。
 * @param newRules - 目标规则。
 * @returns 需删除与需添加的规则。
 */
export function diffRules(oldRules: Iterable<string[]>, newRules: Iterable<string[]>): DiffResult<string[]> {
  return computeDiff(oldRules, newRules, ruleKey);
}

/**
 * 批量删除 p 规则，跳过存储中已不存在的规则。
 *
 * casbin 的 removePolicies 在任意一条规则不存在时整批失败，
 * 因此先筛出仍存在的规则再删除。
 *
 * @param store - 规则存储。
 * @param rules - 待删除规则。
 * @returns 实际删除的规则数量。
 */
export async function removePoliciesTolerant(store: RuleStore, rules: readonly string[][]): Promise<number> {
  if (rules.length === 0) {
    return 0;
  }
  const exists = await Promise.all(rules.map((rule) => store.hasPolicy(...rule)));
  const existing = rules.filter((_, index) => exists[index]);
  if (existing.length < rules.length) {
    getLogger().debug(
      { requested: rules.length, missing: rules.length - existing.length },
      'Skipping policies already absent from store',
    );
  }
  if (existing.length === 0) {
    return 0;
  }
  if (!(await store.removePolicies(existing.map((rule) => [...rule])))) {
    throw new Error(`Policy store rejected removing ${existing.length} policies`);
  }
  return existing.length;
}

/**
 * 批量添加 p 规则。
 *
 * casbin 的 addPolicies 在任意一条规则已存在时整批失败并返回 false，
 * 此时抛出错误而不是报告未发生的写入。
 *
 * @param store - 规则存储。
 * @param rules - 待添加规则。
 * @returns 添加的规则数量。
 */
export async function addPoliciesChecked(store: RuleStore, rules: readonly string[][]): Promise<number> {
  if (rules.length === 0) {
    return 0;
  }
  if (!(await store.addPolicies(rules.map((rule) => [...rule])))) {
    throw new Error(`Policy store rejected adding ${rules.length} policies`);
  }
  return rules.length;
}

/**
 * 批量删除指定命名空间的 grouping 规则，跳过已不存在的规则。
 *
 * @param store - 规则存储。
 * @param ptype - grouping 命名空间。
 * @param rules - 待删除规则。
 * @returns 实际删除的规则数量。
 */
export async function removeNamedGroupingPoliciesTolerant(
  store: RuleStore,
  ptype: string,
  rules: readonly string[][],
): Promise<number> {
  if (rules.length === 0) {
    return 0;
  }
  const exists = await Promise.all(rules.map((rule) => store.hasNamedGroupingPolicy(ptype, ...rule)));
  const existing = rules.filter((_, index) => exists[index]);
  if (existing.length < rules.length) {
    getLogger().debug(
      { ptype, requested: rules.length, missing: rules.length - existing.length },
      'Skipping grouping policies already absent from store',
    );
  }
  if (existing.length === 0) {
    return 0;
  }
  if (!(await store.removeNamedGroupingPolicies(ptype, existing.map((rule) => [...rule])))) {
    throw new Error(`Policy store rejected removing ${existing.length} ${ptype} policies`);
  }
  return existing.length;
}

/**
 * 批量添加指定命名空间的 grouping 规则，整批被拒绝时抛出错误。
 *
 * @param store - 规则存储。
 * @param ptype - grouping 命名空间。
 * @param rules - 待添加规则。
 * @returns 添加的规则数量。
 */
export async function addNamedGroupingPoliciesChecked(
  store: RuleStore,
  ptype: string,
  rules: readonly string[][],
): Promise<number> {
  if (rules.length === 0) {
    return 0;
  }
  if (!(await store.addNamedGroupingPolicies(ptype, rules.map((rule) => [...rule])))) {
    throw new Error(`Policy store rejected adding ${rules.length} ${ptype} policies`);
  }
  return rules.length;
}
