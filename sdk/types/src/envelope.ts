import type { RenderedEvent } from './event';
import type { SdkInfo } from './sdkinfo';

/** 信封头部 */
export interface EventEnvelopeHeaders {
  event_id: string;
  sent_at: string;
  sdk?: SdkInfo;
  dsn?: string;
}

/** 信封项目的头部 */
export interface EventItemHeaders {
  type: 'event';
}

/** 一个事件项目，由头部和渲染后的事件组成 */
export type EventItem = [EventItemHeaders, RenderedEvent];

/**
 * 信封由头部和一系列项目组成，头部包含元数据，项目是信封的主要内容
 */
export type Envelope = [EventEnvelopeHeaders, EventItem[]];
