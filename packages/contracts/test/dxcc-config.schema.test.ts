import { test } from 'node:test';
import assert from 'node:assert/strict';
import { DxccConfigSchema, DxccConfigUpdateSchema } from '../src/index.js';

test('配置默认值', () => {
  assert.deepEqual(DxccConfigSchema.parse({}), {
    backend: 'indexed',
    validation: 'warn',
    logLevel: 'info',
  });
});

test('配置枚举值校验', () => {
  assert.equal(DxccConfigSchema.safeParse({ backend: 'scan' }).success, true);
  assert.equal(DxccConfigSchema.safeParse({ backend: 'btree' }).success, false);
  assert.equal(DxccConfigSchema.safeParse({ validation: 'loose' }).success, false);
  assert.equal(DxccConfigSchema.safeParse({ logLevel: 'trace' }).success, false);
});

test('配置更新不填默认值', () => {
  assert.deepEqual(DxccConfigUpdateSchema.parse({ validation: 'strict' }), { validation: 'strict' });
});
