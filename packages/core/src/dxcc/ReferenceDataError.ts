/**
 * ReferenceDataError - 参考数据相关的错误
 *
 * 加载参考表、解析配置等基础设施层面的失败。
 * 呼号本身的分析失败不走这里，见 CallsignError。
 */

/**
 * 错误代码枚举
 */
export enum ReferenceDataErrorCode {
  INVALID_DOCUMENT = 'INVALID_DOCUMENT',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
  TABLE_NOT_LOADED = 'TABLE_NOT_LOADED',
}

export class ReferenceDataError extends Error {
  /**
   * 错误代码
   */
  public readonly code: ReferenceDataErrorCode;

  /**
   * 错误上下文（额外信息）
   */
  public readonly context?: Record<string, unknown>;

  constructor(options: {
    code: ReferenceDataErrorCode;
    message: string;
    cause?: unknown;
    context?: Record<string, unknown>;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });

    this.name = 'ReferenceDataError';
    this.code = options.code;
    this.context = options.context;

    // 保持正确的原型链
    Object.setPrototypeOf(this, ReferenceDataError.prototype);
  }

  /**
   * 参考表文档不符合 Schema
   */
  static invalidDocument(issues: string[], cause?: unknown): ReferenceDataError {
    return new ReferenceDataError({
      code: ReferenceDataErrorCode.INVALID_DOCUMENT,
      message: `参考表格式错误: ${issues.join('; ')}`,
      cause,
      context: { issues },
    });
  }

  /**
   * strict 模式下校验未通过
   */
  static validationFailed(issues: string[]): ReferenceDataError {
    return new ReferenceDataError({
      code: ReferenceDataErrorCode.VALIDATION_FAILED,
      message: `参考表校验失败，共 ${issues.length} 个问题`,
      context: { issues },
    });
  }

  static invalidConfig(issues: string[], cause?: unknown): ReferenceDataError {
    return new ReferenceDataError({
      code: ReferenceDataErrorCode.INVALID_CONFIG,
      message: `配置无效: ${issues.join('; ')}`,
      cause,
      context: { issues },
    });
  }

  static tableNotLoaded(): ReferenceDataError {
    return new ReferenceDataError({
      code: ReferenceDataErrorCode.TABLE_NOT_LOADED,
      message: '参考表尚未加载',
    });
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}
