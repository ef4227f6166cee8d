import type { AdminNode } from '../admin/types.js';
import { getLogger } from '../logger/index.js';
import { addNamedGroupingPoliciesChecked, diffRules, removeNamedGroupingPoliciesTolerant } from './diff.js';
import { RESOURCE_GROUPING_TYPE, type RuleStore } from './types.js';

/**
 * 获取后台树中全部上下级关系 [上级 ID, 下级 ID]。
 *
 * app 指向自身的节点是站点根节点，不产生关系。
 *
 * @param group - 后台分组。
 * @returns 关系列表（深度优先顺序）。
 */
export function getAdminGrouping(group: AdminNode): Array<[string, string]> {
  const relations: Array<[string, string]> = [];
  for (const node of group.children() ?? []) {
    if (node.app === node) {
      continue;
    }
    relations.push([node.app.uniqueId, node.uniqueId]);
    if (node.children()) {
      relations.push(...getAdminGrouping(node));
    }
  }
  return relations;
}

/** 资源关系同步结果。 */
export interface GroupingSyncResult {
  removed: number;
  added: number;
}

/**
 * 将后台树的上下级关系增量同步到 grouping 命名空间。
 *
 * @param store - 规则存储。
 * @param site - 站点根节点。
 * @param ptype - grouping 命名空间，默认 g2。
 * @returns 实际增删数量。
 */
export async function syncAdminGrouping(
  store: RuleStore,
  site: AdminNode,
  ptype: string = RESOURCE_GROUPING_TYPE,
): Promise<GroupingSyncResult> {
  const oldRelations = await store.getFilteredNamedGroupingPolicy(ptype, 0);
  const { remove, add } = diffRules(oldRelations, getAdminGrouping(site));

  const removed = await removeNamedGroupingPoliciesTolerant(store, ptype, remove);
  const added = await addNamedGroupingPoliciesChecked(store, ptype, add);

  getLogger().info({ ptype, removed, added }, 'Admin resource grouping synchronized');
  return { removed, added };
}
