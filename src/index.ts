export { AppConfigSchema } from './config/schema.js';
export type { AppConfig, PolicyConfig, OptionLabels } from './config/schema.js';
export { loadConfig, getConfig, setConfig, resetConfig } from './config/index.js';
export type { LoadConfigOptions } from './config/index.js';
export { createLogger, getLogger } from './logger/index.js';

export type { AdminNode, CapabilityOption, PageSchema } from './admin/types.js';
export {
  PAGE_ACTION,
  DEFAULT_OPTION_LABELS,
  actionPermission,
  buildAdminActionOptions,
  CapabilityTreeCache,
  getAdminActionOptions,
  invalidateAdminActionOptions,
} from './admin/options.js';
export {
  DEFAULT_ROOT_SUBJECT,
  filterOptions,
  collectOptionValues,
  getAdminActionOptionsBySubject,
} from './admin/filter.js';
export type { SubjectOptionsParams } from './admin/filter.js';
export { StaticAdminNode, createAdminSite, loadAdminSite } from './admin/static-site.js';
export type { AdminNodeDescriptor, AdminNodeKind } from './admin/static-site.js';

export {
  PAGE_DOMAIN,
  RESOURCE_GROUPING_TYPE,
} from './policy/types.js';
export type {
  PolicyEffect,
  RuleStore,
  DiffResult,
  FieldRow,
  CheckedRow,
  FieldPolicyMatrix,
  FieldEffectMatrix,
} from './policy/types.js';
export {
  PERMISSION_DELIMITER,
  encodePermission,
  decodePermission,
  decodePermissionStrict,
  enforcePermission,
} from './policy/codec.js';
export {
  ruleKey,
  computeDiff,
  diffRules,
  removePoliciesTolerant,
  removeNamedGroupingPoliciesTolerant,
  addPoliciesChecked,
  addNamedGroupingPoliciesChecked,
} from './policy/diff.js';
export {
  getSubjectPermissions,
  parseRoleKeys,
  updateSubjectRoles,
  updateSubjectPermissions,
} from './policy/subject.js';
export type {
  SubjectPermissionsParams,
  UpdateSubjectPermissionsParams,
  SubjectPermissionsUpdate,
} from './policy/subject.js';
export { toFieldAction } from './policy/legacy.js';
export {
  buildFieldPolicyMatrix,
  buildFieldEffectMatrix,
  applyFieldPolicyMatrix,
} from './policy/field-matrix.js';
export type {
  FieldPolicyMatrixParams,
  FieldEffectMatrixParams,
  ApplyFieldPolicyMatrixParams,
  FieldPolicyUpdate,
} from './policy/field-matrix.js';
export { getSchemaFieldLabels, buildFieldRows } from './policy/schema-fields.js';
export { getAdminGrouping, syncAdminGrouping } from './policy/grouping.js';
export type { GroupingSyncResult } from './policy/grouping.js';
export {
  DEFAULT_MODEL_PATH,
  createPolicyEnforcer,
  createEnforcerFromConfig,
} from './policy/enforcer.js';
export type { PolicyEnforcerOptions } from './policy/enforcer.js';
