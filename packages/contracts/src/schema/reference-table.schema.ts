import { z } from 'zod';

/**
 * DXCC 参考数据表 Schema
 *
 * 参考表由外部加载器（ClubLog cty.xml 等）解析为普通对象后交给核心，
 * 这里只负责在边界处校验字段并把时间戳统一转换为 Date（UTC）。
 */

// ADIF 中表示"无 DXCC 实体"的保留值（/MM、/AM、/SAT）
export const ADIF_ID_NO_DXCC = 0;

// 前缀/例外记录中的特殊实体名称
export const ENTITY_NAME_INVALID = 'INVALID';
export const ENTITY_NAME_MARITIME_MOBILE = 'MARITIME MOBILE';
export const ENTITY_NAME_AERONAUTICAL_MOBILE = 'AERONAUTICAL MOBILE';
export const ENTITY_NAME_SATELLITE = 'SATELLITE, INTERNET OR REPEATER';

// 时间戳：ISO-8601 字符串、毫秒时间戳或 Date
export const TimestampSchema = z
  .union([z.string().datetime({ offset: true }), z.number().int(), z.date()])
  .pipe(z.coerce.date());

export const AdifSchema = z.number().int().nonnegative();
export const CqZoneSchema = z.number().int().positive();
export const ContinentSchema = z.enum(['AF', 'AN', 'AS', 'EU', 'NA', 'OC', 'SA']);

// 有效时间窗口，缺省的一端视为无界
export const ValidityWindowSchema = z.object({
  start: TimestampSchema.optional(),
  end: TimestampSchema.optional(),
});

// 地理位置字段（前缀、呼号例外共用）
const LocationFieldsSchema = z.object({
  cqz: CqZoneSchema.optional(),
  cont: ContinentSchema.optional(),
  long: z.number().min(-180).max(180).optional(),
  lat: z.number().min(-90).max(90).optional(),
});

/**
 * DXCC 实体
 * whitelist 为 true 时只有呼号例外表中列出的呼号才算有效，
 * whitelistStart/whitelistEnd 是独立于实体本身有效期的限制窗口
 */
export const EntitySchema = ValidityWindowSchema.extend({
  adif: AdifSchema,
  name: z.string().min(1),
  prefix: z.string(),
  deleted: z.boolean().default(false),
  cqz: CqZoneSchema.optional(),
  cont: ContinentSchema.optional(),
  long: z.number().min(-180).max(180).optional(),
  lat: z.number().min(-90).max(90).optional(),
  whitelist: z.boolean().optional(),
  whitelistStart: TimestampSchema.optional(),
  whitelistEnd: TimestampSchema.optional(),
});

/**
 * 呼号前缀，call 可能是 SV/A 这样的复合前缀
 */
export const PrefixSchema = ValidityWindowSchema.merge(LocationFieldsSchema).extend({
  record: z.number().int().nonnegative(),
  call: z.string().min(1),
  entity: z.string(),
  adif: AdifSchema,
});

/**
 * 呼号例外：完整呼号（含前缀和后缀）精确匹配
 */
export const CallsignExceptionSchema = ValidityWindowSchema.merge(LocationFieldsSchema).extend({
  record: z.number().int().nonnegative(),
  call: z.string().min(1),
  entity: z.string(),
  adif: AdifSchema,
});

export const InvalidOperationSchema = ValidityWindowSchema.extend({
  record: z.number().int().nonnegative(),
  call: z.string().min(1),
});

export const ZoneExceptionSchema = ValidityWindowSchema.extend({
  record: z.number().int().nonnegative(),
  call: z.string().min(1),
  zone: CqZoneSchema,
});

// 完整参考表
export const ReferenceTableSchema = z.object({
  date: TimestampSchema.optional(),
  entities: z.array(EntitySchema).default([]),
  prefixes: z.array(PrefixSchema).default([]),
  exceptions: z.array(CallsignExceptionSchema).default([]),
  invalidOperations: z.array(InvalidOperationSchema).default([]),
  zoneExceptions: z.array(ZoneExceptionSchema).default([]),
});

export type ValidityWindow = z.infer<typeof ValidityWindowSchema>;
export type Continent = z.infer<typeof ContinentSchema>;
export type Entity = z.infer<typeof EntitySchema>;
export type Prefix = z.infer<typeof PrefixSchema>;
export type CallsignException = z.infer<typeof CallsignExceptionSchema>;
export type InvalidOperation = z.infer<typeof InvalidOperationSchema>;
export type ZoneException = z.infer<typeof ZoneExceptionSchema>;
export type ReferenceTable = z.infer<typeof ReferenceTableSchema>;
// 外部加载器提供的原始文档（时间戳可以是字符串）
export type ReferenceTableInput = z.input<typeof ReferenceTableSchema>;
