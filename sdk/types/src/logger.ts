import type { ConsoleLevel } from './instrument';

/** 日志函数，接受任意数量的参数 */
export type LoggerMethod = (...args: unknown[]) => void;

/** SDK 内部使用的日志对象，每个控制台级别对应一个方法 */
export interface Logger extends Record<ConsoleLevel, LoggerMethod> {
  disable(): void;
  enable(): void;
  isEnabled(): boolean;
}
