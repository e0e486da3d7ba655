import type { JsonCodec } from './codec';
import type { DsnLike } from './dsn';
import type { Event, RenderedEvent } from './event';
import type { ConsoleLevel } from './instrument';
import type { Logger } from './logger';
import type { SdkInfo } from './sdkinfo';
import type {
  EventSender,
  SendFailureReason,
  Transport,
  TransportOptions,
} from './transport';

/**
 * 发送完成的方式
 * - sync: 阻塞等待传输层的结果
 * - none: 交给异步发送器后立即返回，结果中的 eventId 为空字符串
 * - async: 已经退役，使用时会直接抛出配置错误
 */
export type SendResultType = 'sync' | 'none' | 'async';

/** 发送诊断日志时允许使用的级别 */
export type DiagnosticLogLevel = Extract<
  ConsoleLevel,
  'debug' | 'info' | 'warn' | 'error' | 'log'
>;

/**
 * 一次提交的结果，每次提交只会得到其中一种
 */
export type SendEventResult =
  | { status: 'ok'; eventId: string }
  | { status: 'unsampled' }
  | { status: 'excluded' }
  | { status: 'error'; reason: SendFailureReason };

/**
 * 以 `[对象, 方法名]` 形式配置的钩子，调用时 this 指向该对象
 */
export type HookMethodRef = readonly [target: object, method: string];

/**
 * 钩子可以是一个函数，也可以是一个对象和它的方法名
 *
 * 配置为函数时，函数声明的参数个数必须和钩子的参数个数一致
 */
export type HookCallable<Args extends unknown[], R> =
  | ((...args: Args) => R)
  | HookMethodRef;

/**
 * 发送前的钩子，返回假值会丢弃事件，返回事件则继续使用返回的事件
 */
export type BeforeSendEventHook = HookCallable<
  [event: Event],
  Event | null | undefined | false
>;

/**
 * 发送后的钩子，只用于观察，返回值会被忽略
 */
export type AfterSendEventHook = HookCallable<
  [event: Event, result: SendEventResult],
  unknown
>;

/**
 * 记录最近一次发送的事件，供 UI 或日志关联使用
 */
export interface LastEventStore {
  record(eventId: string, source?: Event['source']): void;
  lastEventId(): string | undefined;
  lastEventSource(): Event['source'] | undefined;
}

/**
 * 单次提交时可以覆盖的配置
 */
export interface SendEventOptions {
  /** 本次提交的完成方式 */
  result?: SendResultType;
  /** 本次提交的采样率 */
  sampleRate?: number;
  /** 交给传输层的重试次数 */
  requestRetries?: number;
}

/**
 * 客户端的配置选项
 */
export interface ClientOptions {
  /** 服务端地址，没有 DSN 时阻塞发送会失败并返回 invalid_dsn */
  dsn?: DsnLike;

  /** 是否打开 SDK 内部的调试日志 */
  debug?: boolean;

  /**
   * 事件的采样率，取值在 0 到 1 之间，默认为 1
   */
  sampleRate?: number;

  /** 默认的完成方式 */
  sendResult?: SendResultType;

  /** 默认交给传输层的重试次数 */
  requestRetries?: number;

  /** 发送失败诊断日志的级别 */
  logLevel?: DiagnosticLogLevel;

  /** 序列化工具，清洗事件和编码信封都会用到 */
  jsonCodec?: JsonCodec;

  /**
   * 在事件发送前调用，可以修改事件或者返回假值丢弃事件
   */
  beforeSendEvent?: BeforeSendEventHook | null;

  /**
   * 在事件发送后调用，拿到最终的事件和结果
   */
  afterSendEvent?: AfterSendEventHook | null;

  /** 创建传输层的工厂函数 */
  transport?: (options: TransportOptions) => Transport;

  /** 不等待结果的异步发送器 */
  sender?: EventSender;

  /** 异步发送器最多同时处理的信封数量 */
  bufferSize?: number;

  /** 采样用的随机数来源，返回 [0, 1) 之间的数 */
  random?: () => number;

  /** 记录最近一次事件的存储 */
  lastEventStore?: LastEventStore;

  /** 输出发送失败诊断日志的日志对象 */
  logger?: Logger;

  /** SDK 自身的元数据 */
  _metadata?: { sdk?: SdkInfo };
}

/**
 * 客户端负责事件的采样、钩子调用、渲染和发送
 */
export interface Client<O extends ClientOptions = ClientOptions> {
  /** 返回创建客户端时传入的选项 */
  getOptions(): O;

  /**
   * 提交一个事件，返回本次提交的结果
   *
   * 配置错误（例如使用了已经退役的发送方式）会直接抛出
   */
  sendEvent(event: Event, options?: SendEventOptions): PromiseLike<SendEventResult>;

  /** 把事件渲染成最终上报的载荷，但不发送 */
  renderEvent(event: Event): RenderedEvent;

  /** 最近一次成功交给传输层的事件 ID */
  lastEventId(): string | undefined;

  /** 等待所有异步发送完成 */
  flush(timeout?: number): PromiseLike<boolean>;
}
