import type { Breadcrumb } from './breadcrumb';
import type { Exception } from './exception';
import type { Extras } from './extra';
import type { Request } from './request';
import type { SdkInfo } from './sdkinfo';
import type { SeverityLevel } from './severity';
import type { User } from './user';

/**
 * 事件的来源
 * - logger: 由日志系统产生的事件，这类事件发送失败时不会再输出诊断日志，避免日志和上报之间无限循环
 * - manual: 用户主动上报的事件
 * - integration: 由集成自动采集的事件
 */
export type EventSource = 'logger' | 'manual' | 'integration';

/**
 * 一条要上报的错误或消息记录
 *
 * 除 event_id 外所有字段都是可选的；下划线命名的字段会原样进入上报载荷，
 * 驼峰命名的 source 和 originalException 只在 SDK 内部使用，渲染时会被移除
 */
export interface Event {
  /** 事件的唯一标识，32 位十六进制字符串 */
  event_id: string;
  /** 事件发生的时间，单位为秒 */
  timestamp?: number;
  level?: SeverityLevel;
  platform?: string;
  logger?: string;
  server_name?: string;
  release?: string;
  dist?: string;
  environment?: string;
  transaction?: string;
  culprit?: string;
  fingerprint?: string[];
  /** 自由文本消息，渲染时会被截断到服务端允许的最大长度 */
  message?: string;
  breadcrumbs?: Breadcrumb[];
  sdk?: SdkInfo;
  request?: Request;
  /** 任意附加数据，渲染时会被清洗成可序列化的值 */
  extra?: Extras;
  tags?: { [key: string]: unknown };
  user?: User;
  contexts?: { [key: string]: Record<string, unknown> };
  modules?: { [key: string]: string };
  exception?: Exception[];

  /** 事件的来源，不会被上报 */
  source?: EventSource;
  /** 产生该事件的原始异常，不会被上报 */
  originalException?: unknown;
}

/** 只在 SDK 内部使用、不会跨越传输边界的字段 */
export type NonPayloadEventKey = 'source' | 'originalException';

/**
 * 渲染后的事件，已经移除内部字段并完成清洗，可以直接交给传输层
 */
export type RenderedEvent = Omit<Event, NonPayloadEventKey>;
