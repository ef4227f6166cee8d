/** 页面描述（菜单显示名与排序权重）。 */
export interface PageSchema {
  label: string;
  /** 排序权重，越大越靠前；缺省按 0 处理。 */
  sort?: number | null;
}

/**
 * 后台管理树中的一个节点。
 *
 * 节点种类不通过类型判断区分，而是通过能力谓词：
 * 动作容器（带列表或表单的页面）、子分组、普通页面。
 */
export interface AdminNode {
  /** 全站唯一 ID，作为权限规则中的资源字段。 */
  readonly uniqueId: string;
  /** 页面描述，为 null 时该节点不出现在权限树中。 */
  readonly pageSchema: PageSchema | null;
  /** 所属应用（上级分组）；站点根节点的 app 指向自身。 */
  readonly app: AdminNode;
  /** 是否为可注册动作的页面。 */
  isActionContainer(): boolean;
  /** 是否带有数据列表视图（提供 list / filter 动作）。 */
  hasListView(): boolean;
  /** 是否为单表单页面（提交即一个动作）。 */
  isSingleForm(): boolean;
  /** 已注册的动作：name → 显示名。 */
  registeredActions(): ReadonlyMap<string, string>;
  /** 子节点；不是分组时返回 null。 */
  children(): readonly AdminNode[] | null;
}

/** 权限树选项（供前端树形选择组件使用）。 */
export interface CapabilityOption {
  label: string;
  /** 编码后的权限键。 */
  value: string;
  sort?: number | null;
  children?: CapabilityOption[];
}
