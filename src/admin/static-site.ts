import { z } from 'zod';
import { readJsonFile } from '../utils/file.js';
import type { AdminNode, PageSchema } from './types.js';

/** 节点种类：普通页面 / 数据列表页 / 单表单页 / 分组。 */
const AdminNodeKindSchema = z.enum(['page', 'model', 'form', 'group']);

export type AdminNodeKind = z.infer<typeof AdminNodeKindSchema>;

/** JSON 描述的后台节点。 */
export interface AdminNodeDescriptor {
  id: string;
  kind: AdminNodeKind;
  label?: string;
  sort?: number | null;
  /** 已注册的动作：name → 显示名。 */
  actions?: Record<string, string>;
  children?: AdminNodeDescriptor[];
}

const AdminNodeDescriptorSchema: z.ZodType<AdminNodeDescriptor> = z.lazy(() =>
  z.object({
    id: z.string().min(1).refine((id) => !id.includes('#'), { message: 'id must not contain "#"' }),
    kind: AdminNodeKindSchema,
    label: z.string().optional(),
    sort: z.number().int().nullable().optional(),
    actions: z.record(z.string(), z.string()).optional(),
    children: z.array(AdminNodeDescriptorSchema).optional(),
  }),
);

/**
 * 由 JSON 描述构建的后台节点。
 */
export class StaticAdminNode implements AdminNode {
  readonly uniqueId: string;
  readonly pageSchema: PageSchema | null;
  readonly app: AdminNode;
  private readonly kind: AdminNodeKind;
  private readonly actions: ReadonlyMap<string, string>;
  private readonly nodes: StaticAdminNode[] | null;

  constructor(descriptor: AdminNodeDescriptor, app?: AdminNode) {
    this.uniqueId = descriptor.id;
    this.kind = descriptor.kind;
    this.pageSchema = descriptor.label === undefined
      ? null
      : { label: descriptor.label, sort: descriptor.sort ?? null };
    this.app = app ?? this;
    this.actions = new Map(Object.entries(descriptor.actions ?? {}));
    this.nodes = descriptor.kind === 'group'
      ? (descriptor.children ?? []).map((child) => new StaticAdminNode(child, this))
      : null;
  }

  isActionContainer(): boolean {
    return this.kind === 'model' || this.kind === 'form';
  }

  hasListView(): boolean {
    return this.kind === 'model';
  }

  isSingleForm(): boolean {
    return this.kind === 'form';
  }

  registeredActions(): ReadonlyMap<string, string> {
    return this.actions;
  }

  children(): readonly AdminNode[] | null {
    return this.nodes;
  }
}

/**
 * 校验 JSON 描述并构建站点根节点。
 *
 * @param raw - 未校验的站点描述。
 * @returns 站点根节点。
 * @throws 描述不合法或根节点不是分组时抛出错误。
 */
export function createAdminSite(raw: unknown): StaticAdminNode {
  const descriptor = AdminNodeDescriptorSchema.parse(raw);
  if (descriptor.kind !== 'group') {
    throw new Error(`Admin site root must be a group, got "${descriptor.kind}"`);
  }
  return new StaticAdminNode(descriptor);
}

/**
 * 从 JSON 文件加载站点。
 *
 * @param filePath - 站点描述文件路径。
 * @returns 站点根节点。
 * @throws 文件不存在或描述不合法时抛出错误。
 */
export function loadAdminSite(filePath: string): StaticAdminNode {
  const raw = readJsonFile<unknown>(filePath);
  if (raw === null) {
    throw new Error(`Admin site file not found: ${filePath}`);
  }
  return createAdminSite(raw);
}
