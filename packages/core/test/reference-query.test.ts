import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { ReferenceTableSchema } from '@dxcc/contracts';
import type { QueryBackend } from '@dxcc/contracts';
import { createReferenceQuery } from '../src/dxcc/createReferenceQuery.js';
import { IndexedReferenceQuery } from '../src/dxcc/IndexedReferenceQuery.js';
import { ScanReferenceQuery } from '../src/dxcc/ScanReferenceQuery.js';
import { at, createFixtureTable, T_2020 } from './fixtures/reference-table.js';

const BACKENDS: QueryBackend[] = ['scan', 'indexed'];

for (const backend of BACKENDS) {
  describe(`参考表查询 (${backend})`, () => {
    const query = createReferenceQuery(createFixtureTable(), backend);

    test('按 adif 查询实体', () => {
      assert.equal(query.getEntity(100, T_2020)?.name, 'ALPHA LAND');
      assert.equal(query.getEntity(999, T_2020), undefined);
    });

    test('实体有效期边界', () => {
      assert.equal(query.getEntity(710, at('1990-10-02T23:59:59Z'))?.name, 'YANKEE OLD');
      assert.equal(query.getEntity(710, at('1990-10-03T00:00:00Z')), undefined);
      assert.equal(query.getEntity(720, at('1990-10-03T00:00:00Z'))?.name, 'YANKEE NEW');
    });

    test('同一前缀按时间选择记录', () => {
      assert.equal(query.getPrefix('Y2', at('1990-10-02T23:59:59Z'))?.adif, 710);
      assert.equal(query.getPrefix('Y2', at('1990-10-03T00:00:00Z'))?.adif, 720);
      // 两条记录之间的空隙
      assert.equal(query.getPrefix('Y2', at('1990-10-02T23:59:59.500Z')), undefined);
    });

    test('前缀只做精确匹配', () => {
      assert.equal(query.getPrefix('AB', T_2020)?.record, 1);
      assert.equal(query.getPrefix('AB1', T_2020), undefined);
      assert.equal(query.getPrefix('CC/A', T_2020)?.adif, 400);
    });

    test('呼号例外和分区例外', () => {
      assert.equal(query.getCallsignException('AB1ZZ', T_2020)?.adif, 200);
      assert.equal(query.getCallsignException('AB1CD', T_2020), undefined);
      assert.equal(query.getZoneException('AB2WW', T_2020), 99);
      assert.equal(query.getZoneException('AB2WW', at('2021-01-01T00:00:01Z')), undefined);
    });

    test('无效运营按时间判断', () => {
      assert.equal(query.isInvalidOperation('AB3BAD', T_2020), true);
      assert.equal(query.isInvalidOperation('AB3BAD', at('2021-01-01T00:00:00Z')), true);
      assert.equal(query.isInvalidOperation('AB3BAD', at('2022-06-01T00:00:00Z')), false);
      assert.equal(query.isInvalidOperation('AB1CD', T_2020), false);
    });

    test('有效期重叠时取表中第一条', () => {
      const overlapping = createReferenceQuery(
        ReferenceTableSchema.parse({
          prefixes: [
            { record: 1, call: 'QQ', entity: 'FIRST', adif: 1, start: '2000-01-01T00:00:00Z' },
            { record: 2, call: 'QQ', entity: 'SECOND', adif: 2 },
          ],
        }),
        backend
      );

      assert.equal(overlapping.getPrefix('QQ', T_2020)?.entity, 'FIRST');
      assert.equal(overlapping.getPrefix('QQ', at('1999-01-01T00:00:00Z'))?.entity, 'SECOND');
    });
  });
}

test('按配置创建对应的查询后端', () => {
  const table = createFixtureTable();

  assert.ok(createReferenceQuery(table, 'scan') instanceof ScanReferenceQuery);
  assert.ok(createReferenceQuery(table, 'indexed') instanceof IndexedReferenceQuery);
});

test('查询结果是参考表中的原始记录', () => {
  const table = createFixtureTable();
  const query = new IndexedReferenceQuery(table);

  assert.equal(query.getPrefix('SV9', T_2020), table.prefixes[3]);
});
