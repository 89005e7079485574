import { PartType } from '@dxcc/contracts';
import type { IReferenceQuery } from '../dxcc/IReferenceQuery.js';
import { CallsignError } from './CallsignError.js';
import { resolvePrefix } from './prefix-resolver.js';

/**
 * 不在第一段时永远不当作前缀的后缀。
 * 例如 MM 单独作为呼号是苏格兰的前缀，作为后缀则表示海上移动。
 */
export const RESERVED_APPENDICES: readonly string[] = ['AM', 'MM', 'SAT', 'P', 'M', 'QRP', 'LH'];

export function isReservedAppendix(part: string): boolean {
  return RESERVED_APPENDICES.includes(part);
}

export interface CallsignSegment {
  part: string;
  type: PartType;
}

/**
 * 呼号结构
 * - single: 整个呼号就是一个前缀段，没有后缀
 * - complete: 一或两个前缀段，后面跟零或多个后缀
 */
export type CallsignShape =
  | { kind: 'single' }
  | { kind: 'complete'; prefixCount: 1 | 2 };

type SegmenterState =
  | { kind: 'noPrefix' }
  | { kind: 'single' }
  | { kind: 'complete'; prefixCount: 1 | 2 };

/**
 * 按 / 切分呼号，并逐段判断是前缀还是其他
 * 每一段单独做前缀匹配（不带后缀），第二段起的保留后缀一律视为其他
 */
export function segmentCallsign(query: IReferenceQuery, call: string, timestamp: Date): CallsignSegment[] {
  return call.split('/').map((part, position) => {
    const isPrefix =
      part.length > 0 &&
      resolvePrefix(query, part, timestamp) !== null &&
      !(position >= 1 && isReservedAppendix(part));
    return { part, type: isPrefix ? PartType.PREFIX : PartType.OTHER };
  });
}

/**
 * 用状态机校验分段序列的整体结构
 *
 * | 状态        | 前缀          | 其他                 |
 * |-------------|---------------|----------------------|
 * | noPrefix    | -> single     | BEGIN_WITHOUT_PREFIX |
 * | single      | -> complete(2)| -> complete(1)       |
 * | complete(n) | THIRD_PREFIX  | 保持                 |
 */
export function classifySegments(
  call: string,
  segments: readonly CallsignSegment[]
): { success: true; shape: CallsignShape } | { success: false; error: CallsignError } {
  let state: SegmenterState = { kind: 'noPrefix' };

  for (const segment of segments) {
    const isPrefix = segment.type === PartType.PREFIX;
    switch (state.kind) {
      case 'noPrefix':
        if (!isPrefix) {
          return { success: false, error: CallsignError.beginWithoutPrefix(call, segment.part) };
        }
        state = { kind: 'single' };
        break;
      case 'single':
        state = { kind: 'complete', prefixCount: isPrefix ? 2 : 1 };
        break;
      case 'complete':
        if (isPrefix) {
          return { success: false, error: CallsignError.thirdPrefix(call, segment.part) };
        }
        break;
    }
  }

  if (state.kind === 'noPrefix') {
    // 空序列，split 至少返回一段，正常不会走到这里
    return { success: false, error: CallsignError.beginWithoutPrefix(call, '') };
  }

  return { success: true, shape: state };
}
