import type { QueryBackend, ReferenceTable } from '@dxcc/contracts';
import type { IReferenceQuery } from './IReferenceQuery.js';
import { IndexedReferenceQuery } from './IndexedReferenceQuery.js';
import { ScanReferenceQuery } from './ScanReferenceQuery.js';

/**
 * 按配置创建查询后端，两种后端的查询结果完全一致
 */
export function createReferenceQuery(table: ReferenceTable, backend: QueryBackend): IReferenceQuery {
  switch (backend) {
    case 'scan':
      return new ScanReferenceQuery(table);
    case 'indexed':
      return new IndexedReferenceQuery(table);
  }
}
