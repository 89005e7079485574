import { test } from 'node:test';
import type { TestContext } from 'node:test';
import assert from 'node:assert/strict';
import type { LogLevel } from '@dxcc/contracts';
import { createConsoleLogger } from '../src/dxcc/logger.js';

function captureConsole(t: TestContext) {
  const calls = {
    log: t.mock.method(console, 'log', (..._args: unknown[]) => undefined),
    warn: t.mock.method(console, 'warn', (..._args: unknown[]) => undefined),
    debug: t.mock.method(console, 'debug', (..._args: unknown[]) => undefined),
  };
  return {
    output: () => ({
      log: calls.log.mock.calls.map((call) => call.arguments[0]),
      warn: calls.warn.mock.calls.map((call) => call.arguments[0]),
      debug: calls.debug.mock.calls.map((call) => call.arguments[0]),
    }),
  };
}

function logAll(level: LogLevel) {
  const logger = createConsoleLogger('参考数据', level);
  logger.info('已加载');
  logger.warn('记录重叠');
  logger.debug('开始加载');
}

test('info 级别输出带标签的信息和警告', (t) => {
  const captured = captureConsole(t);

  logAll('info');

  assert.deepEqual(captured.output(), {
    log: ['[参考数据] 已加载'],
    warn: ['⚠️ [参考数据] 记录重叠'],
    debug: [],
  });
});

test('debug 级别额外输出调试信息', (t) => {
  const captured = captureConsole(t);

  logAll('debug');

  assert.deepEqual(captured.output().debug, ['[参考数据] 开始加载']);
});

test('silent 级别不输出任何内容', (t) => {
  const captured = captureConsole(t);

  logAll('silent');

  assert.deepEqual(captured.output(), { log: [], warn: [], debug: [] });
});
