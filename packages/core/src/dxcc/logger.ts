import type { LogLevel } from '@dxcc/contracts';

/**
 * 日志接口，默认输出到 console，测试中可以替换
 */
export interface DxccLogger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  info: 1,
  debug: 2,
};

/**
 * 带组件标签的 console 日志，如 "[参考数据] 参考表已加载"
 * silent 下连警告也不输出
 */
export function createConsoleLogger(tag: string, level: LogLevel): DxccLogger {
  const enabled = (required: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[required];
  return {
    info: (message) => {
      if (enabled('info')) console.log(`[${tag}] ${message}`);
    },
    warn: (message) => {
      if (enabled('info')) console.warn(`⚠️ [${tag}] ${message}`);
    },
    debug: (message) => {
      if (enabled('debug')) console.debug(`[${tag}] ${message}`);
    },
  };
}
