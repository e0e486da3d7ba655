import type { ConsoleLevel } from '@faultline/types';

/**
 * SDK 内部使用的错误类，继承自内置 Error，并添加 logLevel 来控制错误的日志级别
 */
export class SdkError extends Error {
  /** 显示此错误实例的名称，值为当前类的名称 */
  public name: string;

  /** 日志级别 */
  public logLevel: ConsoleLevel;

  public constructor(
    public message: string,
    logLevel: ConsoleLevel = 'warn',
  ) {
    super(message);

    this.name = new.target.prototype.constructor.name;

    // 将当前实例的原型设置为子类的原型，保证 instanceof 在编译到低版本时依然正确
    Object.setPrototypeOf(this, new.target.prototype);
    this.logLevel = logLevel;
  }
}

/**
 * 配置错误属于编程错误，例如钩子的形式不对、使用了已经退役的发送方式，
 * 必须立即抛出，不能被吞掉
 */
export class ConfigurationError extends SdkError {
  public constructor(message: string) {
    super(message, 'error');
  }
}
