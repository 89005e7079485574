import { z } from 'zod';

/**
 * 查询后端
 * - scan: 每次查询线性扫描整张表
 * - indexed: 按键分组的哈希索引
 */
export const QueryBackendSchema = z.enum(['scan', 'indexed']);

/**
 * 参考表校验策略
 * - off: 不校验
 * - warn: 发现时间窗口重叠等问题时输出警告
 * - strict: 有任何问题即拒绝加载
 */
export const ValidationModeSchema = z.enum(['off', 'warn', 'strict']);

export const LogLevelSchema = z.enum(['silent', 'info', 'debug']);

export const DxccConfigSchema = z.object({
  backend: QueryBackendSchema.default('indexed'),
  validation: ValidationModeSchema.default('warn'),
  logLevel: LogLevelSchema.default('info'),
});

// 配置更新（所有字段可选）
export const DxccConfigUpdateSchema = z.object({
  backend: QueryBackendSchema.optional(),
  validation: ValidationModeSchema.optional(),
  logLevel: LogLevelSchema.optional(),
});

export type QueryBackend = z.infer<typeof QueryBackendSchema>;
export type ValidationMode = z.infer<typeof ValidationModeSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type DxccConfig = z.infer<typeof DxccConfigSchema>;
export type DxccConfigUpdate = z.infer<typeof DxccConfigUpdateSchema>;
