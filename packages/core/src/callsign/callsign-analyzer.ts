/**
 * 呼号分析器
 *
 * 根据参考表把呼号解析为 DXCC 实体、CQ 分区、大洲和坐标。
 * 分析不修改参考表，也不输出日志。
 *
 * 覆盖规则按固定顺序执行：
 * 格式检查 -> 无效运营 -> 呼号例外 -> 分段与结构校验 -> 按结构解析前缀
 * （特殊后缀 -> 海上移动前缀 -> 单数字后缀替换 -> 本地前缀）-> CQ 分区例外
 */

import {
  ADIF_ID_NO_DXCC,
  ENTITY_NAME_AERONAUTICAL_MOBILE,
  ENTITY_NAME_MARITIME_MOBILE,
  ENTITY_NAME_SATELLITE,
  SpecialEntityAppendix,
} from '@dxcc/contracts';
import type { Callsign, CallsignException, Prefix } from '@dxcc/contracts';
import type { IReferenceQuery } from '../dxcc/IReferenceQuery.js';
import { CallsignError } from './CallsignError.js';
import { classifySegments, segmentCallsign } from './callsign-segmenter.js';
import type { CallsignShape } from './callsign-segmenter.js';
import { isCompoundPrefix, resolvePrefix } from './prefix-resolver.js';
import type { PrefixMatch } from './prefix-resolver.js';

export type AnalyzeResult =
  | { success: true; callsign: Callsign }
  | { success: false; error: CallsignError };

// 只允许大写字母、数字和段间的 /，不能以 / 开头或结尾，也不能出现空段
const CALLSIGN_FORMAT = /^[A-Z0-9]+(?:\/[A-Z0-9]+)*$/;

// 单数字替换：SV0ABC -> SV9ABC
const HOMECALL_DIGIT = /^([A-Z0-9]+)(\d)([A-Z0-9]+)$/;

const SINGLE_DIGIT = /^\d$/;

const NO_ENTITY_APPENDICES: ReadonlyMap<string, SpecialEntityAppendix> = new Map([
  ['MM', SpecialEntityAppendix.MM],
  ['AM', SpecialEntityAppendix.AM],
  ['SAT', SpecialEntityAppendix.SAT],
]);

// 呼号例外中的特殊实体名称
const SPECIAL_ENTITY_NAMES: ReadonlyMap<string, SpecialEntityAppendix> = new Map([
  [ENTITY_NAME_MARITIME_MOBILE, SpecialEntityAppendix.MM],
  [ENTITY_NAME_AERONAUTICAL_MOBILE, SpecialEntityAppendix.AM],
  [ENTITY_NAME_SATELLITE, SpecialEntityAppendix.SAT],
]);

/**
 * 前缀解析阶段的产出
 * - special: 不属于任何实体（/MM、/AM、/SAT 或海上移动前缀），不再应用分区例外
 * - prefix: 按前缀记录构造结果，之后应用分区例外
 */
type Resolution =
  | { kind: 'special'; appendix: SpecialEntityAppendix }
  | { kind: 'prefix'; prefix: Readonly<Prefix> };

interface HomecallContext {
  call: string;
  timestamp: Date;
  homecall: string;
  appendices: string[];
  homecallPrefix: PrefixMatch;
}

type HomecallRule = (query: IReferenceQuery, ctx: HomecallContext) => Resolution | CallsignError | null;

/**
 * 结果是否不属于任何 DXCC 实体（/AM、/MM、/SAT）
 */
export function isSpecialEntity(callsign: Callsign): boolean {
  return callsign.adif === ADIF_ID_NO_DXCC;
}

export function isMaritimeMobilePrefix(prefix: Readonly<Prefix>): boolean {
  return prefix.entity === ENTITY_NAME_MARITIME_MOBILE;
}

function isSingleDigitAppendix(part: string): boolean {
  return SINGLE_DIGIT.test(part);
}

function fromPrefix(call: string, prefix: Readonly<Prefix>): Callsign {
  return {
    call,
    adif: prefix.adif,
    dxcc: prefix.entity,
    cqzone: prefix.cqz,
    continent: prefix.cont,
    longitude: prefix.long,
    latitude: prefix.lat,
  };
}

function fromException(call: string, exception: Readonly<CallsignException>): Callsign {
  const callsign: Callsign = {
    call,
    adif: exception.adif,
    dxcc: exception.entity,
    cqzone: exception.cqz,
    continent: exception.cont,
    longitude: exception.long,
    latitude: exception.lat,
  };
  const special = SPECIAL_ENTITY_NAMES.get(exception.entity);
  return special ? { ...callsign, specialEntity: special } : callsign;
}

function fromSpecialAppendix(call: string, appendix: SpecialEntityAppendix): Callsign {
  return { call, adif: ADIF_ID_NO_DXCC, specialEntity: appendix };
}

// ========== 单前缀 + 后缀的规则链 ==========

/**
 * /AM、/MM、/SAT 后缀：呼号的前缀无关紧要
 */
const specialAppendixRule: HomecallRule = (_query, ctx) => {
  const found = ctx.appendices.filter((part) => NO_ENTITY_APPENDICES.has(part));
  if (found.length > 1) return CallsignError.multipleSpecialAppendices(ctx.call, found);
  const appendix = found.length === 1 ? NO_ENTITY_APPENDICES.get(found[0]) : undefined;
  return appendix ? { kind: 'special', appendix } : null;
};

/**
 * 前缀记录本身指向海上移动
 */
const maritimePrefixRule: HomecallRule = (_query, ctx) => {
  if (!isMaritimeMobilePrefix(ctx.homecallPrefix.prefix)) return null;
  return { kind: 'special', appendix: SpecialEntityAppendix.MM };
};

/**
 * 单数字后缀替换本地呼号中的数字后重新匹配前缀
 * SV0ABC/9：SV 是希腊，SV9 是克里特岛
 */
const singleDigitRule: HomecallRule = (query, ctx) => {
  const digits = ctx.appendices.filter(isSingleDigitAppendix);
  if (digits.length === 0) return null;
  if (digits.length > 1) return CallsignError.multipleSingleDigitAppendices(ctx.call, digits);

  const digit = digits[0];
  const substituted = ctx.homecall.replace(
    HOMECALL_DIGIT,
    (_match, head: string, _old: string, tail: string) => `${head}${digit}${tail}`
  );
  const match = resolvePrefix(query, substituted, ctx.timestamp, ctx.appendices);
  return match ? { kind: 'prefix', prefix: match.prefix } : null;
};

const homecallPrefixRule: HomecallRule = (_query, ctx) => ({
  kind: 'prefix',
  prefix: ctx.homecallPrefix.prefix,
});

const HOMECALL_RULES: readonly HomecallRule[] = [
  specialAppendixRule,
  maritimePrefixRule,
  singleDigitRule,
  homecallPrefixRule,
];

export class CallsignAnalyzer {
  constructor(private readonly query: IReferenceQuery) {}

  /**
   * 分析呼号
   * @param call 完整呼号（大写），如 W1AW、SV0ABC/9、F/W1AW/P
   * @param timestamp 通联时间（UTC）
   */
  analyze(call: string, timestamp: Date): AnalyzeResult {
    if (!CALLSIGN_FORMAT.test(call) || call.length < 2) {
      return { success: false, error: CallsignError.basicFormat(call) };
    }

    if (this.query.isInvalidOperation(call, timestamp)) {
      return { success: false, error: CallsignError.invalidOperation(call) };
    }

    // 呼号例外优先于一切前缀规则，也不再应用分区例外
    const exception = this.query.getCallsignException(call, timestamp);
    if (exception) {
      return { success: true, callsign: fromException(call, exception) };
    }

    const segments = segmentCallsign(this.query, call, timestamp);
    const classified = classifySegments(call, segments);
    if (!classified.success) {
      return classified;
    }

    const parts = segments.map((segment) => segment.part);
    const resolution = this.resolveShape(call, parts, classified.shape, timestamp);
    if (resolution instanceof CallsignError) {
      return { success: false, error: resolution };
    }

    if (resolution.kind === 'special') {
      return { success: true, callsign: fromSpecialAppendix(call, resolution.appendix) };
    }

    return {
      success: true,
      callsign: this.applyZoneException(fromPrefix(call, resolution.prefix), timestamp),
    };
  }

  private resolveShape(
    call: string,
    parts: string[],
    shape: CallsignShape,
    timestamp: Date
  ): Resolution | CallsignError {
    if (shape.kind === 'single') {
      return this.resolveSinglePrefix(call, timestamp);
    }
    if (shape.prefixCount === 1) {
      return this.resolveHomecall(call, parts, timestamp);
    }
    return this.resolveTwoPrefixes(call, parts, timestamp);
  }

  /**
   * 整个呼号只有一段，例如 W1AW
   */
  private resolveSinglePrefix(call: string, timestamp: Date): Resolution | CallsignError {
    const match = resolvePrefix(this.query, call, timestamp);
    if (!match) {
      return CallsignError.beginWithoutPrefix(call, call);
    }
    if (isMaritimeMobilePrefix(match.prefix)) {
      return { kind: 'special', appendix: SpecialEntityAppendix.MM };
    }
    return { kind: 'prefix', prefix: match.prefix };
  }

  /**
   * 一个前缀段加若干后缀，例如 W1AW/P、SV0ABC/9
   */
  private resolveHomecall(call: string, parts: string[], timestamp: Date): Resolution | CallsignError {
    const homecall = parts[0];
    const appendices = parts.slice(1);
    const homecallPrefix = resolvePrefix(this.query, homecall, timestamp, appendices);
    if (!homecallPrefix) {
      return CallsignError.beginWithoutPrefix(call, homecall);
    }

    const ctx: HomecallContext = { call, timestamp, homecall, appendices, homecallPrefix };
    for (const rule of HOMECALL_RULES) {
      const outcome = rule(this.query, ctx);
      if (outcome) return outcome;
    }
    return { kind: 'prefix', prefix: homecallPrefix.prefix };
  }

  /**
   * 两个前缀段，例如 F/W1AW、W1ABC/CE0Y
   *
   * 去掉字符更少（更具体）的一方胜出，相同时取第一段。
   * 如果第一段命中的是复合前缀（如 3D2/R），说明第二段其实是复合前缀的一部分，直接取第一段。
   * 这只是启发式规则，不保证对所有真实的复合前缀都正确。
   */
  private resolveTwoPrefixes(call: string, parts: string[], timestamp: Date): Resolution | CallsignError {
    const appendices = parts.slice(1);
    const first = resolvePrefix(this.query, parts[0], timestamp, appendices);
    const second = resolvePrefix(this.query, parts[1], timestamp, appendices);
    if (!first) {
      return CallsignError.beginWithoutPrefix(call, parts[0]);
    }
    if (!second || isCompoundPrefix(first.prefix) || first.removedChars <= second.removedChars) {
      return { kind: 'prefix', prefix: first.prefix };
    }
    return { kind: 'prefix', prefix: second.prefix };
  }

  /**
   * CQ 分区例外只替换分区号，其他字段不变
   */
  private applyZoneException(callsign: Callsign, timestamp: Date): Callsign {
    const zone = this.query.getZoneException(callsign.call, timestamp);
    return zone === undefined ? callsign : { ...callsign, cqzone: zone };
  }
}
