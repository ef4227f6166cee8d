import { z } from 'zod';

/** 日志配置。 */
const LoggingConfigSchema = z.object({
  /** 日志级别。 */
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  /** 日志文件目录（相对路径基于 dataDir 解析）。 */
  directory: z.string().default('logs'),
  /** 单个日志文件最大体积（pino-roll 格式：数字 + k/m/g，如 10m）。 */
  maxSize: z.string().default('10m'),
  /** 保留的轮转文件数量。 */
  maxFiles: z.number().default(10),
});

/** 权限树中固定动作节点的显示名称。 */
const OptionLabelsSchema = z.object({
  /** 查看列表。 */
  list: z.string().default('List'),
  /** 筛选列表。 */
  filter: z.string().default('Filter'),
  /** 表单提交。 */
  submit: z.string().default('Submit'),
});

/** 策略引擎配置。 */
const PolicyConfigSchema = z.object({
  /** casbin 模型文件路径，不填时使用包内自带的 config/policy-model.conf。 */
  modelPath: z.string().optional(),
  /** CSV 策略文件路径（相对路径基于 dataDir 解析）。 */
  policyPath: z.string().default('policy.csv'),
  /** 拥有全部权限、跳过 enforce 检查的主体。 */
  rootSubject: z.string().default('u:root'),
  /** 资源上下级关系使用的 grouping 命名空间。 */
  resourceGroupingType: z.string().default('g2'),
  /** 固定动作节点的显示名称。 */
  labels: OptionLabelsSchema.default(() => ({
    list: 'List',
    filter: 'Filter',
    submit: 'Submit',
  })),
});

/** 应用全局配置 schema。 */
export const AppConfigSchema = z.object({
  /** 数据目录路径。 */
  dataDir: z.string().default('data'),
  /** 日志配置。 */
  logging: LoggingConfigSchema.default(() => ({
    level: 'info' as const,
    directory: 'logs',
    maxSize: '10m',
    maxFiles: 10,
  })),
  /** 策略引擎配置。 */
  policy: PolicyConfigSchema.default(() => ({
    policyPath: 'policy.csv',
    rootSubject: 'u:root',
    resourceGroupingType: 'g2',
    labels: { list: 'List', filter: 'Filter', submit: 'Submit' },
  })),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PolicyConfig = AppConfig['policy'];
export type OptionLabels = PolicyConfig['labels'];
