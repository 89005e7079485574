import type { ReferenceTable, ValidityWindow } from '@dxcc/contracts';
import { groupByKey } from './IndexedReferenceQuery.js';
import { windowsOverlap } from './time-window.js';

export type ReferenceRecordKind = 'entity' | 'prefix' | 'exception' | 'invalidOperation' | 'zoneException';

/**
 * 参考表问题
 * - overlap: 同一个键下两条记录的有效期有交集，查询时后一条永远不会被选中
 * - invertedWindow: start 晚于 end，记录在任何时刻都无效
 */
export interface ReferenceTableIssue {
  type: 'overlap' | 'invertedWindow';
  kind: ReferenceRecordKind;
  key: string;
  // 记录在所属列表中的下标
  indices: number[];
  message: string;
}

interface Indexed<T> {
  index: number;
  record: T;
}

function isInverted(window: ValidityWindow): boolean {
  return window.start !== undefined && window.end !== undefined && window.start.getTime() > window.end.getTime();
}

function checkList<T extends ValidityWindow>(
  kind: ReferenceRecordKind,
  records: readonly T[],
  keyOf: (record: T) => string | number
): ReferenceTableIssue[] {
  const issues: ReferenceTableIssue[] = [];
  const indexed: Indexed<T>[] = records.map((record, index) => ({ index, record }));

  for (const { index, record } of indexed) {
    if (isInverted(record) && record.start && record.end) {
      issues.push({
        type: 'invertedWindow',
        kind,
        key: String(keyOf(record)),
        indices: [index],
        message: `${kind} ${keyOf(record)}: start ${record.start.toISOString()} is after end ${record.end.toISOString()}`,
      });
    }
  }

  // 无效窗口已单独报告，不参与重叠检查
  const groups = groupByKey(
    indexed.filter((item) => !isInverted(item.record)),
    (item) => keyOf(item.record)
  );
  for (const [key, group] of groups) {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        if (windowsOverlap(group[i].record, group[j].record)) {
          issues.push({
            type: 'overlap',
            kind,
            key: String(key),
            indices: [group[i].index, group[j].index],
            message: `${kind} ${key}: records #${group[i].index} and #${group[j].index} have overlapping validity windows`,
          });
        }
      }
    }
  }

  return issues;
}

/**
 * 校验参考表
 * 查询层在同键记录有效期重叠时总是取第一条，这里把这种情况显式报告出来。
 * 只读，不会修改或重排表中的记录。
 */
export function validateReferenceTable(table: ReferenceTable): ReferenceTableIssue[] {
  return [
    ...checkList('entity', table.entities, (e) => e.adif),
    ...checkList('prefix', table.prefixes, (p) => p.call),
    ...checkList('exception', table.exceptions, (e) => e.call),
    ...checkList('invalidOperation', table.invalidOperations, (o) => o.call),
    ...checkList('zoneException', table.zoneExceptions, (z) => z.call),
  ];
}
