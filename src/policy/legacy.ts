const PAGE_ACTION_PREFIX = 'admin:';
const FIELD_ACTION_PREFIX = 'page:';

/**
 * 将页面动作名转换为字段级规则使用的动作名：`admin:list` → `page:list`。
 *
 * 字段规则早期以 page: 前缀存储，这里只做兼容转换，权限键本身不变。
 * 旧数据迁移完成后可以删除本函数。
 *
 * @param action - 页面动作名。
 * @returns 字段规则动作名。
 */
export function toFieldAction(action: string): string {
  if (action.startsWith(PAGE_ACTION_PREFIX)) {
    return FIELD_ACTION_PREFIX + action.slice(PAGE_ACTION_PREFIX.length);
  }
  return action;
}
