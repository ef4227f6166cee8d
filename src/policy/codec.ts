import type { RuleStore } from './types.js';

/** 权限键字段分隔符。 */
export const PERMISSION_DELIMITER = '#';

/**
 * 将规则字段编码为权限键（从 v1 开始），null/undefined 字段被跳过。
 *
 * @param fields - 规则字段。
 * @returns 以 # 连接的权限键，如 `users#admin:list#page`。
 */
export function encodePermission(...fields: Array<string | null | undefined>): string {
  return fields
    .filter((field): field is string => field !== null && field !== undefined)
    .join(PERMISSION_DELIMITER);
}

/**
 * 将权限键解码为规则字段。去掉首尾的 # 后按 # 切分，不校验字段数量。
 *
 * @param permission - 权限键。
 * @returns 字段数组。
 */
export function decodePermission(permission: string): string[] {
  let start = 0;
  let end = permission.length;
  while (start < end && permission[start] === PERMISSION_DELIMITER) {
    start++;
  }
  while (end > start && permission[end - 1] === PERMISSION_DELIMITER) {
    end--;
  }
  return permission.slice(start, end).split(PERMISSION_DELIMITER);
}

/**
 * 解码权限键并校验字段数量。
 *
 * @param permission - 权限键。
 * @param arity - 期望的字段数量；不传时接受 2 或 3 个字段。
 * @returns 字段数组。
 * @throws 字段数量不符时抛出错误。
 */
export function decodePermissionStrict(permission: string, arity?: 2 | 3): string[] {
  const fields = decodePermission(permission);
  const valid = arity === undefined
    ? fields.length === 2 || fields.length === 3
    : fields.length === arity;
  if (!valid) {
    const expected = arity === undefined ? '2 or 3' : String(arity);
    throw new Error(
      `Invalid permission key "${permission}": expected ${expected} fields, got ${fields.length}`,
    );
  }
  return fields;
}

/**
 * 用权限键对主体做实时评估。
 *
 * @param store - 规则存储。
 * @param subject - 主体（u:xxx 或 r:xxx）。
 * @param permission - 权限键。
 * @returns 是否允许。
 */
export function enforcePermission(store: RuleStore, subject: string, permission: string): Promise<boolean> {
  return store.enforce(subject, ...decodePermissionStrict(permission));
}
