import type {
  CallsignException,
  Entity,
  InvalidOperation,
  Prefix,
  ReferenceTable,
  ValidityWindow,
  ZoneException,
} from '@dxcc/contracts';
import type { IReferenceQuery } from './IReferenceQuery.js';
import { isActiveAt } from './time-window.js';

/**
 * 按键分组：键 -> 记录列表，列表内保持参考表中的原始顺序
 */
export function groupByKey<K, T>(records: readonly T[], keyOf: (record: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const record of records) {
    const key = keyOf(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

function findActive<K, T extends ValidityWindow>(
  groups: Map<K, T[]>,
  key: K,
  timestamp: Date
): T | undefined {
  return groups.get(key)?.find((record) => isActiveAt(record, timestamp));
}

/**
 * 哈希索引实现
 * 构建时按键分组一次，之后每次查询只遍历同键的少量历史记录。
 * 与 ScanReferenceQuery 的查询结果完全一致。
 */
export class IndexedReferenceQuery implements IReferenceQuery {
  private readonly entities: Map<number, Entity[]>;
  private readonly prefixes: Map<string, Prefix[]>;
  private readonly exceptions: Map<string, CallsignException[]>;
  private readonly invalidOperations: Map<string, InvalidOperation[]>;
  private readonly zoneExceptions: Map<string, ZoneException[]>;

  constructor(table: ReferenceTable) {
    this.entities = groupByKey(table.entities, (e) => e.adif);
    this.prefixes = groupByKey(table.prefixes, (p) => p.call);
    this.exceptions = groupByKey(table.exceptions, (e) => e.call);
    this.invalidOperations = groupByKey(table.invalidOperations, (o) => o.call);
    this.zoneExceptions = groupByKey(table.zoneExceptions, (z) => z.call);
  }

  getEntity(adif: number, timestamp: Date): Readonly<Entity> | undefined {
    return findActive(this.entities, adif, timestamp);
  }

  getPrefix(prefix: string, timestamp: Date): Readonly<Prefix> | undefined {
    return findActive(this.prefixes, prefix, timestamp);
  }

  getCallsignException(callsign: string, timestamp: Date): Readonly<CallsignException> | undefined {
    return findActive(this.exceptions, callsign, timestamp);
  }

  getZoneException(callsign: string, timestamp: Date): number | undefined {
    return findActive(this.zoneExceptions, callsign, timestamp)?.zone;
  }

  isInvalidOperation(callsign: string, timestamp: Date): boolean {
    return findActive(this.invalidOperations, callsign, timestamp) !== undefined;
  }
}
