import type { JsonCodec } from './codec';
import type { DsnLike } from './dsn';
import type { Envelope } from './envelope';
import type { SdkInfo } from './sdkinfo';

/**
 * 阻塞发送失败的原因
 * - invalid_dsn: 没有配置 DSN 或 DSN 无法解析
 * - invalid_json: 信封编码失败
 * - request_failure: 请求失败；error 是 Error 实例时表示捕获到了带堆栈的异常
 */
export type SendFailureReason =
  | { type: 'invalid_dsn' }
  | { type: 'invalid_json'; error: unknown }
  | { type: 'request_failure'; error: unknown };

/** 传输层提交一个信封的结果 */
export type TransportPostResult =
  | { ok: true; eventId: string }
  | { ok: false; reason: SendFailureReason };

/** 发送请求时的参数 */
export interface TransportRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
}

/** 服务端的响应 */
export interface TransportMakeRequestResponse {
  statusCode?: number;
  headers?: Record<string, string | null>;
  body?: unknown;
}

/** 真正执行网络请求的函数 */
export type TransportRequestExecutor = (
  request: TransportRequest,
) => PromiseLike<TransportMakeRequestResponse>;

/** 创建传输层时由客户端传入的选项 */
export interface TransportOptions {
  dsn?: DsnLike;
  codec: JsonCodec;
  sdk?: SdkInfo;
}

/**
 * 传输层，负责把信封发送到服务端
 */
export interface Transport {
  /**
   * 提交一个信封，retries 原样交给传输层决定如何重试
   */
  post(envelope: Envelope, retries: number): PromiseLike<TransportPostResult>;
}

/**
 * 不等待结果的异步发送器
 */
export interface EventSender {
  sendAsync(envelope: Envelope): void;
  /** 等待所有已经交出去的发送完成，超时返回 false */
  flush(timeout?: number): PromiseLike<boolean>;
}
