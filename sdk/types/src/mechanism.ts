/**
 * 描述异常的捕获方式，帮助服务端对异常分类
 */
export interface Mechanism {
  /**
   * 异常捕获的方式，例如 `onerror`、`onunhandledrejection`、`generic`
   */
  type: string;

  /** 异常是否已经被用户代码处理 */
  handled?: boolean;

  /** 与捕获机制相关的任意数据 */
  data?: {
    [key: string]: string | boolean;
  };

  /** 是否是 SDK 合成的异常（例如抛出的不是 Error 实例） */
  synthetic?: boolean;
}
