import type { OptionLabels } from '../config/schema.js';
import { encodePermission } from '../policy/codec.js';
import { PAGE_DOMAIN } from '../policy/types.js';
import type { AdminNode, CapabilityOption } from './types.js';

/** 页面访问动作。 */
export const PAGE_ACTION = 'admin:page';

/** 固定动作节点的默认显示名称。 */
export const DEFAULT_OPTION_LABELS: OptionLabels = {
  list: 'List',
  filter: 'Filter',
  submit: 'Submit',
};

/**
 * 生成节点上某个动作的权限键。
 *
 * @param node - 后台节点。
 * @param action - 动作名（不含 admin: 前缀）。
 * @returns 权限键。
 */
export function actionPermission(node: AdminNode, action: string): string {
  return encodePermission(node.uniqueId, `admin:${action}`, PAGE_DOMAIN);
}

/**
 * 生成动作容器下的动作选项。
 *
 * 列表页固定带 list/filter；未显式注册 submit 的单表单页补一个 submit。
 */
function buildActionOptions(node: AdminNode, labels: OptionLabels): CapabilityOption[] {
  const actions = node.registeredActions();
  const children: CapabilityOption[] = [];
  if (node.hasListView()) {
    children.push({ label: labels.list, value: actionPermission(node, 'list') });
    children.push({ label: labels.filter, value: actionPermission(node, 'filter') });
  } else if (node.isSingleForm() && !actions.has('submit')) {
    children.push({ label: labels.submit, value: actionPermission(node, 'submit') });
  }
  for (const [name, label] of actions) {
    children.push({ label, value: actionPermission(node, name) });
  }
  return children;
}

/**
 * 遍历分组，生成全部页面与动作的权限树。
 *
 * 同级节点按 sort 降序排列（null 视为 0），sort 相同时保持原顺序。
 *
 * @param group - 后台分组（通常为站点根节点）。
 * @param labels - 固定动作节点的显示名称。
 * @returns 权限树。
 */
export function buildAdminActionOptions(
  group: AdminNode,
  labels: OptionLabels = DEFAULT_OPTION_LABELS,
): CapabilityOption[] {
  const options: CapabilityOption[] = [];
  for (const node of group.children() ?? []) {
    const page = node.pageSchema;
    if (!page) {
      continue;
    }
    const item: CapabilityOption = {
      label: page.label,
      value: encodePermission(node.uniqueId, PAGE_ACTION, PAGE_DOMAIN),
      sort: page.sort ?? null,
    };
    if (node.isActionContainer()) {
      item.children = buildActionOptions(node, labels);
    } else if (node.children()) {
      item.children = buildAdminActionOptions(node, labels);
    }
    options.push(item);
  }
  // Array.prototype.sort 是稳定排序。
  return options.sort((a, b) => (b.sort ?? 0) - (a.sort ?? 0));
}

/**
 * 权限树缓存，按根节点对象身份缓存构建结果。
 *
 * 后台结构在启动后视为不变；需要重新加载时调用 invalidate()。
 */
export class CapabilityTreeCache {
  private trees = new WeakMap<AdminNode, CapabilityOption[]>();

  constructor(private readonly labels: OptionLabels = DEFAULT_OPTION_LABELS) {}

  /**
   * 获取根节点对应的权限树，首次访问时构建。
   *
   * 返回的树被缓存共享，调用方不应修改；需要裁剪时使用 filterOptions()。
   */
  get(root: AdminNode): CapabilityOption[] {
    let tree = this.trees.get(root);
    if (!tree) {
      tree = buildAdminActionOptions(root, this.labels);
      this.trees.set(root, tree);
    }
    return tree;
  }

  /**
   * 使缓存失效。
   *
   * @param root - 指定根节点；不传时清空全部缓存。
   */
  invalidate(root?: AdminNode): void {
    if (root) {
      this.trees.delete(root);
      return;
    }
    this.trees = new WeakMap();
  }
}

const defaultCaches = new Map<string, CapabilityTreeCache>();

/**
 * 使用进程级缓存获取权限树，每组显示名称各有一个缓存。
 *
 * @param root - 站点根节点。
 * @param labels - 固定动作节点的显示名称，通常取自 config.policy.labels。
 * @returns 权限树。
 */
export function getAdminActionOptions(
  root: AdminNode,
  labels: OptionLabels = DEFAULT_OPTION_LABELS,
): CapabilityOption[] {
  const key = JSON.stringify([labels.list, labels.filter, labels.submit]);
  let cache = defaultCaches.get(key);
  if (!cache) {
    cache = new CapabilityTreeCache(labels);
    defaultCaches.set(key, cache);
  }
  return cache.get(root);
}

/**
 * 使进程级缓存失效。
 *
 * @param root - 指定根节点；不传时清空全部缓存。
 */
export function invalidateAdminActionOptions(root?: AdminNode): void {
  for (const cache of defaultCaches.values()) {
    cache.invalidate(root);
  }
}
