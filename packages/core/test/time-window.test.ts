import { test } from 'node:test';
import assert from 'node:assert/strict';
import { isActiveAt, isInTimeWindow, windowsOverlap } from '../src/dxcc/time-window.js';
import { at } from './fixtures/reference-table.js';

const START = at('2019-01-01T00:00:00Z');
const END = at('2021-01-01T00:00:00Z');

test('时间窗口两端都包含', () => {
  assert.equal(isInTimeWindow(START, START, END), true);
  assert.equal(isInTimeWindow(END, START, END), true);
  assert.equal(isInTimeWindow(at('2018-12-31T23:59:59Z'), START, END), false);
  assert.equal(isInTimeWindow(at('2021-01-01T00:00:01Z'), START, END), false);
});

test('缺省的一端视为无界', () => {
  assert.equal(isInTimeWindow(at('1900-01-01T00:00:00Z')), true);
  assert.equal(isInTimeWindow(at('1900-01-01T00:00:00Z'), undefined, END), true);
  assert.equal(isInTimeWindow(at('2999-01-01T00:00:00Z'), START), true);
  assert.equal(isInTimeWindow(at('1900-01-01T00:00:00Z'), START), false);
});

test('start 晚于 end 的窗口永远无效', () => {
  assert.equal(isActiveAt({ start: END, end: START }, at('2020-01-01T00:00:00Z')), false);
  assert.equal(isActiveAt({ start: END, end: START }, END), false);
});

test('窗口重叠判断', () => {
  assert.equal(windowsOverlap({ start: START, end: END }, { start: END }), true);
  assert.equal(windowsOverlap({ end: at('1990-10-02T23:59:59Z') }, { start: at('1990-10-03T00:00:00Z') }), false);
  assert.equal(windowsOverlap({}, { start: START, end: END }), true);
  assert.equal(windowsOverlap({ end: START }, { end: END }), true);
});
