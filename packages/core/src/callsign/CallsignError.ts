/**
 * CallsignError - 呼号分析失败
 *
 * 分析器不抛出该错误，而是放在 AnalyzeResult 的失败分支里返回。
 */

import { CallsignErrorCode } from '@dxcc/contracts';
import type { CallsignAnalysisError } from '@dxcc/contracts';

const USER_MESSAGES: Record<CallsignErrorCode, string> = {
  [CallsignErrorCode.BASIC_FORMAT]: '呼号格式错误',
  [CallsignErrorCode.INVALID_OPERATION]: '该呼号在此时间属于无效运营',
  [CallsignErrorCode.BEGIN_WITHOUT_PREFIX]: '呼号不以有效前缀开头',
  [CallsignErrorCode.THIRD_PREFIX]: '呼号包含过多前缀',
  [CallsignErrorCode.MULTIPLE_SINGLE_DIGIT_APPENDICES]: '呼号包含多个单数字后缀',
  [CallsignErrorCode.MULTIPLE_SPECIAL_APPENDICES]: '呼号包含多个 /AM、/MM 或 /SAT 后缀',
};

export class CallsignError extends Error {
  /**
   * 错误代码
   */
  public readonly code: CallsignErrorCode;

  /**
   * 被分析的呼号
   */
  public readonly call: string;

  /**
   * 用户友好的错误消息
   */
  public readonly userMessage: string;

  /**
   * 错误上下文
   */
  public readonly context?: Record<string, unknown>;

  constructor(code: CallsignErrorCode, call: string, message: string, context?: Record<string, unknown>) {
    super(message);

    this.name = 'CallsignError';
    this.code = code;
    this.call = call;
    this.userMessage = USER_MESSAGES[code];
    this.context = context;

    Object.setPrototypeOf(this, CallsignError.prototype);
  }

  static basicFormat(call: string): CallsignError {
    return new CallsignError(
      CallsignErrorCode.BASIC_FORMAT,
      call,
      `呼号 "${call}" 含非法字符，或以 / 开头或结尾`
    );
  }

  static invalidOperation(call: string): CallsignError {
    return new CallsignError(CallsignErrorCode.INVALID_OPERATION, call, `呼号 "${call}" 属于无效运营`);
  }

  static beginWithoutPrefix(call: string, part: string): CallsignError {
    return new CallsignError(
      CallsignErrorCode.BEGIN_WITHOUT_PREFIX,
      call,
      `呼号 "${call}" 的第一段 "${part}" 不是有效前缀`,
      { part }
    );
  }

  static thirdPrefix(call: string, part: string): CallsignError {
    return new CallsignError(CallsignErrorCode.THIRD_PREFIX, call, `呼号 "${call}" 中 "${part}" 是第三个前缀`, {
      part,
    });
  }

  static multipleSingleDigitAppendices(call: string, appendices: string[]): CallsignError {
    return new CallsignError(
      CallsignErrorCode.MULTIPLE_SINGLE_DIGIT_APPENDICES,
      call,
      `呼号 "${call}" 包含多个单数字后缀: ${appendices.join(', ')}`,
      { appendices }
    );
  }

  static multipleSpecialAppendices(call: string, appendices: string[]): CallsignError {
    return new CallsignError(
      CallsignErrorCode.MULTIPLE_SPECIAL_APPENDICES,
      call,
      `呼号 "${call}" 包含多个特殊后缀: ${appendices.join(', ')}`,
      { appendices }
    );
  }

  /**
   * 转换为可序列化的结构（见 CallsignAnalysisErrorSchema）
   */
  toJSON(): CallsignAnalysisError {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      context: this.context,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}
