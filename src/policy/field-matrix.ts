import { getLogger } from '../logger/index.js';
import { decodePermissionStrict, encodePermission } from './codec.js';
import { addPoliciesChecked, removePoliciesTolerant, ruleKey } from './diff.js';
import { toFieldAction } from './legacy.js';
import {
  PAGE_DOMAIN,
  type CheckedRow,
  type FieldEffectMatrix,
  type FieldPolicyMatrix,
  type FieldRow,
  type PolicyEffect,
  type RuleStore,
} from './types.js';

/**
 * 解码页面权限键，得到字段规则的 (v1, v2)。
 *
 * @param permission - 页面权限键，如 `users#admin:list#page`。
 * @returns 资源 ID 与转换后的字段动作名。
 */
function fieldScope(permission: string): [string, string] {
  const [v1, v2] = decodePermissionStrict(permission, 3);
  return [v1, toFieldAction(v2)];
}

function checked<R extends FieldRow>(row: R, value: boolean): CheckedRow<R> {
  return { ...row, checked: value };
}

/** 字段权限读取参数。 */
export interface FieldPolicyMatrixParams<R extends FieldRow> {
  subject: string;
  /** 字段所属的页面动作权限键。 */
  permission: string;
  rows: readonly R[];
}

/**
 * 读取主体的字段权限配置，存在 default（未设置）/ allow / deny 三种状态。
 *
 * 每一行在三个列表中各出现一次，且恰好在其中一个列表里 checked 为 true。
 *
 * @param store - 规则存储。
 * @param params - 主体、页面权限键与字段行。
 * @returns [default, allow, deny] 矩阵。
 */
export async function buildFieldPolicyMatrix<R extends FieldRow>(
  store: RuleStore,
  params: FieldPolicyMatrixParams<R>,
): Promise<FieldPolicyMatrix<R>> {
  const { subject, permission, rows } = params;
  const [v1, v2] = fieldScope(permission);
  const rules = await store.getFilteredPolicy(0, subject, v1, v2, '', '');

  const allowRules = new Set<string>();
  const denyRules = new Set<string>();
  for (const rule of rules) {
    const effect = rule[rule.length - 1];
    const perm = encodePermission(...rule.slice(1, -1));
    if (effect === 'allow') {
      allowRules.add(perm);
    } else {
      denyRules.add(perm);
    }
  }

  const matrix: FieldPolicyMatrix<R> = [[], [], []];
  const [defaultRows, allowRows, denyRows] = matrix;
  for (const row of rows) {
    const isAllow = allowRules.has(row.rol);
    const isDeny = !isAllow && denyRules.has(row.rol);
    defaultRows.push(checked(row, !isAllow && !isDeny));
    allowRows.push(checked(row, isAllow));
    denyRows.push(checked(row, isDeny));
  }
  return matrix;
}

/** 字段权限执行结果参数。 */
export interface FieldEffectMatrixParams<R extends FieldRow> {
  subject: string;
  rows: readonly R[];
}

/**
 * 计算主体对每个字段的实际执行结果（经角色继承后的 enforce），只有 allow 和 deny。
 *
 * @param store - 规则存储。
 * @param params - 主体与字段行。
 * @returns [allow, deny] 矩阵。
 * @throws 字段行的权限键不是 3 段时抛出错误。
 */
export async function buildFieldEffectMatrix<R extends FieldRow>(
  store: RuleStore,
  params: FieldEffectMatrixParams<R>,
): Promise<FieldEffectMatrix<R>> {
  const { subject, rows } = params;
  const effects = await Promise.all(
    rows.map((row) => store.enforce(subject, ...decodePermissionStrict(row.rol, 3))),
  );
  const matrix: FieldEffectMatrix<R> = [[], []];
  rows.forEach((row, index) => {
    matrix[0].push(checked(row, effects[index]));
    matrix[1].push(checked(row, !effects[index]));
  });
  return matrix;
}

/** 字段权限写入参数。 */
export interface ApplyFieldPolicyMatrixParams {
  subject: string;
  /** 字段所属的页面动作权限键。 */
  permission: string;
  /** 前端提交的 [default, allow, deny] 矩阵；为空时不做任何修改。 */
  matrix?: readonly (readonly CheckedRow[])[] | null;
}

/** 字段权限写入结果。 */
export interface FieldPolicyUpdate {
  removed: number;
  added: number;
}

/**
 * 用前端提交的矩阵整体替换主体在某个页面动作下的字段权限。
 *
 * 先删除 (subject, v1, v2) 下全部字段规则（page 域规则除外），
 * 再按 allow / deny 列表中勾选的行写入新规则。
 *
 * @param store - 规则存储。
 * @param params - 主体、页面权限键与矩阵。
 * @returns 实际增删数量。
 * @throws 同一行同时在 allow 与 deny 中勾选、行不属于该页面动作或指向 page 域时抛出错误（此时不写入任何规则）。
 */
export async function applyFieldPolicyMatrix(
  store: RuleStore,
  params: ApplyFieldPolicyMatrixParams,
): Promise<FieldPolicyUpdate> {
  const { subject, permission, matrix } = params;
  if (!matrix || matrix.length === 0) {
    return { removed: 0, added: 0 };
  }
  const allowRows = (matrix[1] ?? []).filter((row) => row.checked);
  const denyRows = (matrix[2] ?? []).filter((row) => row.checked);

  const allowKeys = new Set(allowRows.map((row) => row.rol));
  const conflicts = denyRows.filter((row) => allowKeys.has(row.rol)).map((row) => row.rol);
  if (conflicts.length > 0) {
    throw new Error(`Field permission checked as both allow and deny: ${conflicts.join(', ')}`);
  }

  const [v1, v2] = fieldScope(permission);
  const toRule = (row: CheckedRow, effect: PolicyEffect): string[] => {
    const fields = decodePermissionStrict(row.rol, 3);
    if (fields[0] !== v1 || fields[1] !== v2) {
      throw new Error(`Field permission "${row.rol}" is outside ${encodePermission(v1, v2)}`);
    }
    if (fields[2] === PAGE_DOMAIN) {
      throw new Error(`Field permission "${row.rol}" names the ${PAGE_DOMAIN} domain`);
    }
    return [subject, ...fields, effect];
  };
  const addRules = new Map<string, string[]>();
  for (const rule of [
    ...allowRows.map((row) => toRule(row, 'allow')),
    ...denyRows.map((row) => toRule(row, 'deny')),
  ]) {
    addRules.set(ruleKey(rule), rule);
  }

  const existing = await store.getFilteredPolicy(0, subject, v1, v2, '', '');
  const removed = await removePoliciesTolerant(
    store,
    existing.filter((rule) => rule[3] !== PAGE_DOMAIN),
  );
  const added = await addPoliciesChecked(store, [...addRules.values()]);

  getLogger().info(
    { subject, permission, removed, added },
    'Subject field permissions replaced',
  );
  return { removed, added };
}
