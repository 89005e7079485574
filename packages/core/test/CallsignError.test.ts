import { test } from 'node:test';
import assert from 'node:assert/strict';
import { CallsignAnalysisErrorSchema, CallsignErrorCode } from '@dxcc/contracts';
import { CallsignError } from '../src/callsign/CallsignError.js';

test('工厂方法设置错误代码和上下文', () => {
  const error = CallsignError.thirdPrefix('AB1CD/SV1XY/AB9', 'AB9');

  assert.ok(error instanceof CallsignError);
  assert.ok(error instanceof Error);
  assert.equal(error.name, 'CallsignError');
  assert.equal(error.code, CallsignErrorCode.THIRD_PREFIX);
  assert.equal(error.call, 'AB1CD/SV1XY/AB9');
  assert.equal(error.message, '呼号 "AB1CD/SV1XY/AB9" 中 "AB9" 是第三个前缀');
  assert.equal(error.userMessage, '呼号包含过多前缀');
  assert.deepEqual(error.context, { part: 'AB9' });
});

test('没有上下文的错误', () => {
  const error = CallsignError.invalidOperation('AB3BAD');

  assert.equal(error.context, undefined);
  assert.equal(error.toString(), '[invalid_operation] 呼号 "AB3BAD" 属于无效运营');
});

test('toJSON 符合分析错误 Schema', () => {
  const json = CallsignError.multipleSpecialAppendices('AB1CD/MM/AM', ['MM', 'AM']).toJSON();

  assert.deepEqual(json, {
    code: 'multiple_special_appendices',
    message: '呼号 "AB1CD/MM/AM" 包含多个特殊后缀: MM, AM',
    userMessage: '呼号包含多个 /AM、/MM 或 /SAT 后缀',
    context: { appendices: ['MM', 'AM'] },
  });
  assert.equal(CallsignAnalysisErrorSchema.safeParse(json).success, true);
});
