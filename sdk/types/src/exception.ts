import type { Mechanism } from './mechanism';
import type { Stacktrace } from './stacktrace';

/**
 * 存储和传递关于异常的详细信息，便于在错误报告中提供足够的上下文
 */
export interface Exception {
  /**
   * 异常的类型，通常是异常类的名称，例如 "TypeError"
   */
  type: string;
  /**
   * 异常的具体描述信息，通常是抛出错误时提供的消息
   */
  value?: string;
  /** 异常发生的模块 */
  module?: string;
  /** 异常发生时所在的线程 ID */
  thread_id?: number;
  /** 异常是如何被捕获的 */
  mechanism?: Mechanism;
  /** 异常关联的堆栈跟踪 */
  stacktrace?: Stacktrace;
}
