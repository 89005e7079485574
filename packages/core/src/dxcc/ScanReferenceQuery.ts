import type { CallsignException, Entity, Prefix, ReferenceTable } from '@dxcc/contracts';
import type { IReferenceQuery } from './IReferenceQuery.js';
import { isActiveAt } from './time-window.js';

/**
 * 线性扫描实现
 * 每次查询遍历整张表，O(n)；适合小表或只查询几次的场景
 */
export class ScanReferenceQuery implements IReferenceQuery {
  constructor(private readonly table: ReferenceTable) {}

  getEntity(adif: number, timestamp: Date): Readonly<Entity> | undefined {
    return this.table.entities.find((e) => e.adif === adif && isActiveAt(e, timestamp));
  }

  getPrefix(prefix: string, timestamp: Date): Readonly<Prefix> | undefined {
    return this.table.prefixes.find((p) => p.call === prefix && isActiveAt(p, timestamp));
  }

  getCallsignException(callsign: string, timestamp: Date): Readonly<CallsignException> | undefined {
    return this.table.exceptions.find((e) => e.call === callsign && isActiveAt(e, timestamp));
  }

  getZoneException(callsign: string, timestamp: Date): number | undefined {
    return this.table.zoneExceptions.find((z) => z.call === callsign && isActiveAt(z, timestamp))?.zone;
  }

  isInvalidOperation(callsign: string, timestamp: Date): boolean {
    return this.table.invalidOperations.some((o) => o.call === callsign && isActiveAt(o, timestamp));
  }
}
