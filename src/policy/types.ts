/** 规则效果。 */
export type PolicyEffect = 'allow' | 'deny';

/** 页面/动作级权限规则所在的域。 */
export const PAGE_DOMAIN = 'page';

/** 资源上级 -> 下级 的 grouping 命名空间。 */
export const RESOURCE_GROUPING_TYPE = 'g2';

/**
 * 规则存储接口。
 *
 * 这是 casbin Enforcer 管理 API 的一个子集，casbin 的 Enforcer
 * 可以直接作为 RuleStore 使用。规则按 `[sub, v1, v2, v3, eft]` 存储。
 */
export interface RuleStore {
  /** 对请求做实时评估。 */
  enforce(...rvals: string[]): Promise<boolean>;
  /** 按字段过滤 p 规则，空字符串表示该字段不参与过滤。 */
  getFilteredPolicy(fieldIndex: number, ...fieldValues: string[]): Promise<string[][]>;
  /** 获取主体经角色继承得到的全部规则。 */
  getImplicitPermissionsForUser(user: string, ...domain: string[]): Promise<string[][]>;
  /** 判断 p 规则是否存在。 */
  hasPolicy(...params: string[]): Promise<boolean>;
  /** 批量添加 p 规则，任意一条已存在时整批失败并返回 false。 */
  addPolicies(rules: string[][]): Promise<boolean>;
  /** 批量删除 p 规则，任意一条不存在时整批失败并返回 false。 */
  removePolicies(rules: string[][]): Promise<boolean>;
  /** 批量添加 g 规则。 */
  addGroupingPolicies(rules: string[][]): Promise<boolean>;
  /** 删除主体的全部角色。 */
  deleteRolesForUser(user: string, domain?: string): Promise<boolean>;
  /** 按字段过滤指定命名空间的 grouping 规则。 */
  getFilteredNamedGroupingPolicy(ptype: string, fieldIndex: number, ...fieldValues: string[]): Promise<string[][]>;
  /** 判断指定命名空间的 grouping 规则是否存在。 */
  hasNamedGroupingPolicy(ptype: string, ...params: string[]): Promise<boolean>;
  /** 批量添加指定命名空间的 grouping 规则。 */
  addNamedGroupingPolicies(ptype: string, rules: string[][]): Promise<boolean>;
  /** 批量删除指定命名空间的 grouping 规则。 */
  removeNamedGroupingPolicies(ptype: string, rules: string[][]): Promise<boolean>;
}

/** 集合差异计算结果。 */
export interface DiffResult<T> {
  /** 旧集合中有、新集合中没有的元素。 */
  remove: T[];
  /** 新集合中有、旧集合中没有的元素。 */
  add: T[];
}

/** 字段权限矩阵中的一行，rol 为该字段的编码权限键。 */
export interface FieldRow {
  rol: string;
  label?: string;
}

/** 带勾选状态的字段行。 */
export type CheckedRow<R extends FieldRow = FieldRow> = R & { checked: boolean };

/** 字段权限配置矩阵：默认 / 允许 / 拒绝。 */
export type FieldPolicyMatrix<R extends FieldRow = FieldRow> = [
  defaultRows: CheckedRow<R>[],
  allowRows: CheckedRow<R>[],
  denyRows: CheckedRow<R>[],
];

/** 字段权限执行结果矩阵：允许 / 拒绝。 */
export type FieldEffectMatrix<R extends FieldRow = FieldRow> = [
  allowRows: CheckedRow<R>[],
  denyRows: CheckedRow<R>[],
];
