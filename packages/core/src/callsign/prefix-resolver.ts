import type { Prefix } from '@dxcc/contracts';
import type { IReferenceQuery } from '../dxcc/IReferenceQuery.js';

export interface PrefixMatch {
  // 命中的前缀记录（参考表中的原始记录）
  prefix: Readonly<Prefix>;
  // 从候选串末尾去掉的字符数，越少越具体
  removedChars: number;
}

const SINGLE_LETTER = /^[A-Z]$/;

/**
 * 单字母后缀，可能与前缀组成 SV/A 这样的复合前缀
 */
export function isSingleCharAppendix(part: string): boolean {
  return SINGLE_LETTER.test(part);
}

/**
 * 最长前缀匹配
 *
 * 从完整候选串开始，每次从末尾去掉一个字符再查，直到剩下一个字符，取第一个命中。
 * UA9ABC 会先命中 UA9 而不是 U。
 * 每个长度下先尝试 "<截断串>/<单字母后缀>"，所以 SV1ABC/A 命中 SV/A 而不是 SV。
 *
 * @param candidate 候选前缀（通常是呼号的某一段）
 * @param appendices 呼号中的其余段，只有单字母的段参与复合前缀匹配
 */
export function resolvePrefix(
  query: IReferenceQuery,
  candidate: string,
  timestamp: Date,
  appendices: readonly string[] = []
): PrefixMatch | null {
  const singleChars = appendices.filter(isSingleCharAppendix);

  for (let length = candidate.length; length >= 1; length--) {
    const shortened = candidate.slice(0, length);
    const removedChars = candidate.length - length;

    for (const appendix of singleChars) {
      const compound = query.getPrefix(`${shortened}/${appendix}`, timestamp);
      if (compound) {
        return { prefix: compound, removedChars };
      }
    }

    const plain = query.getPrefix(shortened, timestamp);
    if (plain) {
      return { prefix: plain, removedChars };
    }
  }

  return null;
}

/**
 * 前缀是否为 SV/A 这类复合前缀
 */
export function isCompoundPrefix(prefix: Readonly<Prefix>): boolean {
  return prefix.call.includes('/');
}
