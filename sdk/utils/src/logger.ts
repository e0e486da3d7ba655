import type { ConsoleLevel, Logger, LoggerMethod } from '@faultline/types';

import { GLOBAL_OBJ } from './worldwide';

/** SDK 日志的默认前缀 */
const PREFIX = 'Faultline Logger ';

/**
 * 创建一个带前缀的控制台日志对象
 *
 * 关闭状态下所有方法都是空操作，打开后会转发给全局 console 对应级别的方法
 *
 * @param prefix 每条日志的前缀
 * @param enabled 初始是否打开
 */
export function makeLogger(
  prefix: string = PREFIX,
  enabled: boolean = false,
): Logger {
  let isLoggerEnabled = enabled;

  const method =
    (level: ConsoleLevel): LoggerMethod =>
    (...args) => {
      // 全局 console 在某些运行时中可能不存在
      const console = GLOBAL_OBJ.console;
      if (!isLoggerEnabled || !console) {
        return;
      }
      Reflect.apply(console[level], console, [`${prefix}[${level}]:`, ...args]);
    };

  return {
    enable: () => {
      isLoggerEnabled = true;
    },
    disable: () => {
      isLoggerEnabled = false;
    },
    isEnabled: () => isLoggerEnabled,
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    log: method('log'),
    assert: method('assert'),
    trace: method('trace'),
  };
}

/**
 * SDK 内部的调试日志，默认关闭，`debug: true` 时打开
 */
export const logger = makeLogger();
