// 呼号分析失败原因
export enum CallsignErrorCode {
  BASIC_FORMAT = 'basic_format',                                   // 含非法字符，或以 / 开头/结尾
  INVALID_OPERATION = 'invalid_operation',                         // 命中无效运营记录
  BEGIN_WITHOUT_PREFIX = 'begin_without_prefix',                   // 第一段不是已知前缀
  THIRD_PREFIX = 'third_prefix',                                   // 出现第三个前缀
  MULTIPLE_SINGLE_DIGIT_APPENDICES = 'multiple_single_digit_appendices', // 多个单数字后缀
  MULTIPLE_SPECIAL_APPENDICES = 'multiple_special_appendices',     // 多个 AM/MM/SAT 后缀
}

// 表示"不属于任何 DXCC 实体"的特殊后缀
export enum SpecialEntityAppendix {
  MM = 'MM',   // 海上移动
  AM = 'AM',   // 航空移动
  SAT = 'SAT', // 卫星、互联网或中继
}

// 呼号分段类型
export enum PartType {
  PREFIX = 'prefix',
  OTHER = 'other',
}
