import { getLogger } from '../logger/index.js';
import { decodePermissionStrict, encodePermission } from './codec.js';
import { addPoliciesChecked, diffRules, removePoliciesTolerant } from './diff.js';
import { PAGE_DOMAIN, type RuleStore } from './types.js';

/** getSubjectPermissions 选项。 */
export interface SubjectPermissionsParams {
  /** 是否包含经角色继承得到的权限。 */
  implicit?: boolean;
}

/**
 * 获取主体的页面权限，返回编码后的权限键列表。
 *
 * 只返回 page 域且效果为 allow 的规则，字段级规则与 deny 规则不计入。
 *
 * @param store - 规则存储。
 * @param subject - 主体。
 * @param params - 选项。
 * @returns 权限键列表（去重，保持存储顺序）。
 */
export async function getSubjectPermissions(
  store: RuleStore,
  subject: string,
  params: SubjectPermissionsParams = {},
): Promise<string[]> {
  const rules = params.implicit
    ? await store.getImplicitPermissionsForUser(subject)
    : await store.getFilteredPolicy(0, subject, '', '', PAGE_DOMAIN);

  const permissions = new Set<string>();
  for (const rule of rules) {
    const [, v1, v2, v3, effect] = rule;
    if (v3 === PAGE_DOMAIN && effect === 'allow') {
      permissions.add(encodePermission(v1, v2, v3));
    }
  }
  return [...permissions];
}

/**
 * 解析逗号分隔的角色键，生成角色主体列表（r:xxx）。
 *
 * 与主体自身相同的角色被排除，避免直接自环；多跳的角色环不做检测。
 *
 * @param subject - 主体。
 * @param roleKeys - 逗号分隔的角色键，如 "admin,editor"。
 * @returns 去重后的角色主体列表。
 */
export function parseRoleKeys(subject: string, roleKeys: string): string[] {
  const roles = new Set<string>();
  for (const key of roleKeys.split(',')) {
    const role = key.trim();
    if (!role) {
      continue;
    }
    const roleSubject = `r:${role}`;
    if (roleSubject !== subject) {
      roles.add(roleSubject);
    }
  }
  return [...roles];
}

/**
 * 更新主体的角色：清空全部现有角色后整体写入新角色（非增量）。
 *
 * @param store - 规则存储。
 * @param subject - 主体。
 * @param roleKeys - 逗号分隔的角色键。
 * @returns 写入的角色主体列表。
 */
export async function updateSubjectRoles(
  store: RuleStore,
  subject: string,
  roleKeys: string = '',
): Promise<string[]> {
  const roles = parseRoleKeys(subject, roleKeys);
  await store.deleteRolesForUser(subject);
  if (roles.length > 0 && !(await store.addGroupingPolicies(roles.map((role) => [subject, role])))) {
    throw new Error(`Policy store rejected roles for ${subject}: ${roles.join(', ')}`);
  }
  getLogger().info({ subject, roles }, 'Subject roles replaced');
  return roles;
}

/** updateSubjectPermissions 参数。 */
export interface UpdateSubjectPermissionsParams {
  subject: string;
  /** 目标权限键列表（v1#v2#v3）。 */
  permissions: readonly string[];
}

/** 页面权限更新结果。 */
export interface SubjectPermissionsUpdate {
  permissions: string[];
  removed: number;
  added: number;
}

/**
 * 按目标权限集合更新主体的页面权限，只写入差异部分。
 *
 * @param store - 规则存储。
 * @param params - 主体与目标权限。
 * @returns 目标权限与实际增删数量。
 * @throws 权限键格式不正确或不属于 page 域时抛出错误（此时不写入任何规则）。
 */
export async function updateSubjectPermissions(
  store: RuleStore,
  params: UpdateSubjectPermissionsParams,
): Promise<SubjectPermissionsUpdate> {
  const { subject, permissions } = params;
  const newRules = permissions.map((permission) => {
    const fields = decodePermissionStrict(permission, 3);
    if (fields[2] !== PAGE_DOMAIN) {
      throw new Error(`Permission key "${permission}" is not in the ${PAGE_DOMAIN} domain`);
    }
    return [subject, ...fields, 'allow'];
  });
  const oldRules = await store.getFilteredPolicy(0, subject, '', '', PAGE_DOMAIN);
  const { remove, add } = diffRules(oldRules, newRules);

  getLogger().debug({ subject, remove: remove.length, add: add.length }, 'Subject permission delta');

  const removed = await removePoliciesTolerant(store, remove);
  const added = await addPoliciesChecked(store, add);
  return { permissions: [...permissions], removed, added };
}
