import type { StackFrame } from './stackframe';

/**
 * 结构化地存储程序执行过程中产生的堆栈跟踪信息
 */
export interface Stacktrace {
  /**
   * 堆栈帧按照调用顺序从最早的到最新的依次排列
   */
  frames: StackFrame[];
}
