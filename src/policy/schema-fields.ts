import type { z } from 'zod';
import { decodePermissionStrict, encodePermission } from './codec.js';
import { toFieldAction } from './legacy.js';
import type { FieldRow } from './types.js';

/**
 * 获取 zod 对象 schema 的字段名与显示名。
 *
 * 显示名取字段的 `.describe()` 文本，没有时使用字段名。
 *
 * @param schema - zod 对象 schema，为空时返回空对象。
 * @param labelPrefix - 显示名前缀。
 * @returns 字段名 → 显示名。
 */
export function getSchemaFieldLabels(
  schema: z.AnyZodObject | null | undefined,
  labelPrefix: string = '',
): Record<string, string> {
  if (!schema) {
    return {};
  }
  const labels: Record<string, string> = {};
  for (const [name, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    labels[name] = labelPrefix + (field.description ?? name);
  }
  return labels;
}

/**
 * 为页面动作下的字段生成权限矩阵行。
 *
 * @param permission - 页面动作权限键，如 `users#admin:list#page`。
 * @param labels - 字段名 → 显示名。
 * @returns 矩阵行，rol 形如 `users#page:list#email`。
 */
export function buildFieldRows(permission: string, labels: Record<string, string>): FieldRow[] {
  const [v1, v2] = decodePermissionStrict(permission, 3);
  const action = toFieldAction(v2);
  return Object.entries(labels).map(([name, label]) => ({
    label,
    rol: encodePermission(v1, action, name),
  }));
}
