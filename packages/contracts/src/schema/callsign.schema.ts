import { z } from 'zod';
import { AdifSchema, ContinentSchema, CqZoneSchema } from './reference-table.schema.js';
import { CallsignErrorCode, SpecialEntityAppendix } from '../types.js';

/**
 * 呼号分析结果
 * 是调用方持有的值对象，不引用参考表中的记录
 */
export const CallsignSchema = z.object({
  call: z.string(),                    // 完整呼号
  adif: AdifSchema,                    // ADIF DXCC 标识
  dxcc: z.string().optional(),         // 实体名称
  cqzone: CqZoneSchema.optional(),
  continent: ContinentSchema.optional(),
  longitude: z.number().optional(),
  latitude: z.number().optional(),
  specialEntity: z.nativeEnum(SpecialEntityAppendix).optional(), // /MM /AM /SAT
});

// 分析失败
export const CallsignAnalysisErrorSchema = z.object({
  code: z.nativeEnum(CallsignErrorCode),
  message: z.string(),
  userMessage: z.string(),
  context: z.record(z.unknown()).optional(),
});

export const CallsignAnalysisSuccessSchema = z.object({
  success: z.literal(true),
  callsign: CallsignSchema,
});

export const CallsignAnalysisFailureSchema = z.object({
  success: z.literal(false),
  error: CallsignAnalysisErrorSchema,
});

/**
 * 序列化后的分析响应（跨进程/接口传输时使用）
 */
export const CallsignAnalysisResponseSchema = z.discriminatedUnion('success', [
  CallsignAnalysisSuccessSchema,
  CallsignAnalysisFailureSchema,
]);

export type Callsign = z.infer<typeof CallsignSchema>;
export type CallsignAnalysisError = z.infer<typeof CallsignAnalysisErrorSchema>;
export type CallsignAnalysisResponse = z.infer<typeof CallsignAnalysisResponseSchema>;
