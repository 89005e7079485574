import type { ValidityWindow } from '@dxcc/contracts';

/**
 * 判断时间戳是否落在 [start, end] 内（两端都包含），缺省的一端视为无界
 */
export function isInTimeWindow(timestamp: Date, start?: Date, end?: Date): boolean {
  const t = timestamp.getTime();
  if (start && t < start.getTime()) return false;
  if (end && t > end.getTime()) return false;
  return true;
}

/**
 * 记录在给定时刻是否有效
 */
export function isActiveAt(window: ValidityWindow, timestamp: Date): boolean {
  return isInTimeWindow(timestamp, window.start, window.end);
}

/**
 * 两个时间窗口是否有交集
 */
export function windowsOverlap(a: ValidityWindow, b: ValidityWindow): boolean {
  const aStart = a.start?.getTime() ?? Number.NEGATIVE_INFINITY;
  const aEnd = a.end?.getTime() ?? Number.POSITIVE_INFINITY;
  const bStart = b.start?.getTime() ?? Number.NEGATIVE_INFINITY;
  const bEnd = b.end?.getTime() ?? Number.POSITIVE_INFINITY;
  return aStart <= bEnd && bStart <= aEnd;
}
