import { test } from 'node:test';
import assert from 'node:assert/strict';
import { IndexedReferenceQuery } from '../src/dxcc/IndexedReferenceQuery.js';
import { isCompoundPrefix, isSingleCharAppendix, resolvePrefix } from '../src/callsign/prefix-resolver.js';
import { createFixtureTable, T_2020 } from './fixtures/reference-table.js';

const query = new IndexedReferenceQuery(createFixtureTable());

test('最长前缀匹配', () => {
  const ab = resolvePrefix(query, 'AB1CD', T_2020);
  assert.equal(ab?.prefix.call, 'AB');
  assert.equal(ab?.removedChars, 3);

  const ab9 = resolvePrefix(query, 'AB9CD', T_2020);
  assert.equal(ab9?.prefix.call, 'AB9');
  assert.equal(ab9?.removedChars, 2);

  const exact = resolvePrefix(query, 'A', T_2020);
  assert.equal(exact?.prefix.adif, 600);
  assert.equal(exact?.removedChars, 0);
});

test('没有任何前缀时返回 null', () => {
  assert.equal(resolvePrefix(query, 'X5ABC', T_2020), null);
  assert.equal(resolvePrefix(query, '', T_2020), null);
});

test('单字母后缀优先组成复合前缀', () => {
  const compound = resolvePrefix(query, 'CC1AB', T_2020, ['A']);
  assert.equal(compound?.prefix.call, 'CC/A');
  assert.equal(compound?.removedChars, 3);

  const plain = resolvePrefix(query, 'CC1AB', T_2020);
  assert.equal(plain?.prefix.call, 'CC');
});

test('多字母和数字后缀不参与复合前缀', () => {
  assert.equal(resolvePrefix(query, 'CC1AB', T_2020, ['MM', '9', 'QRP'])?.prefix.call, 'CC');
  assert.equal(resolvePrefix(query, 'SV1CD', T_2020, ['A'])?.prefix.call, 'SV');
});

test('后缀与复合前缀判断', () => {
  assert.equal(isSingleCharAppendix('A'), true);
  assert.equal(isSingleCharAppendix('9'), false);
  assert.equal(isSingleCharAppendix('AB'), false);

  assert.equal(isCompoundPrefix({ record: 1, call: 'CC/A', entity: 'CHARLIE ALFA', adif: 400 }), true);
  assert.equal(isCompoundPrefix({ record: 2, call: 'CC', entity: 'CHARLIE', adif: 500 }), false);
});

test('匹配结果至少保留第一个字符', () => {
  for (const call of ['AB1CD', 'AB9CD', 'SV1CD', 'SV9ZZ', 'CC1AB', 'A1A', 'ZZ9ZZZ', 'MM0ABC']) {
    const match = resolvePrefix(query, call, T_2020);
    assert.notEqual(match, null, `${call} 应能匹配前缀`);
    assert.ok(match !== null && match.removedChars <= call.length - 1, call);
    assert.equal(match !== null && call.startsWith(match.prefix.call), true, call);
  }
});
