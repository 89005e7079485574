import { DxccConfigSchema, DxccConfigUpdateSchema } from '@dxcc/contracts';
import type { DxccConfig, DxccConfigUpdate } from '@dxcc/contracts';
import type { ZodError } from 'zod';
import { ReferenceDataError } from './ReferenceDataError.js';

// 默认配置
export const DEFAULT_DXCC_CONFIG: DxccConfig = DxccConfigSchema.parse({});

// 配置字段 -> 环境变量
const ENV_KEYS: ReadonlyMap<string, string> = new Map([
  ['backend', 'DXCC_BACKEND'],
  ['validation', 'DXCC_VALIDATION'],
  ['logLevel', 'DXCC_LOG_LEVEL'],
]);

function envValue(env: NodeJS.ProcessEnv, field: string): string | undefined {
  const key = ENV_KEYS.get(field);
  const value = key ? env[key]?.trim().toLowerCase() : undefined;
  return value ? value : undefined;
}

function describeIssues(error: ZodError, fieldName: (field: string) => string): string[] {
  return error.issues.map((issue) => `${fieldName(issue.path.join('.'))}: ${issue.message}`);
}

/**
 * 合并配置：显式传入 > 环境变量 > 默认值
 * 任何一层的值不合法都会抛出 ReferenceDataError
 */
export function resolveDxccConfig(
  partial: DxccConfigUpdate = {},
  env: NodeJS.ProcessEnv = process.env
): DxccConfig {
  const envResult = DxccConfigUpdateSchema.safeParse({
    backend: envValue(env, 'backend'),
    validation: envValue(env, 'validation'),
    logLevel: envValue(env, 'logLevel'),
  });
  if (!envResult.success) {
    throw ReferenceDataError.invalidConfig(
      describeIssues(envResult.error, (field) => ENV_KEYS.get(field) ?? field),
      envResult.error
    );
  }

  const merged = DxccConfigSchema.safeParse({
    backend: partial.backend ?? envResult.data.backend,
    validation: partial.validation ?? envResult.data.validation,
    logLevel: partial.logLevel ?? envResult.data.logLevel,
  });
  if (!merged.success) {
    throw ReferenceDataError.invalidConfig(describeIssues(merged.error, (field) => field), merged.error);
  }
  return merged.data;
}
