import type {
  DsnComponents,
  Envelope,
  EventEnvelopeHeaders,
  RenderedEvent,
  SdkInfo,
} from '@faultline/types';
import {
  createEnvelope,
  createEventEnvelopeItem,
  dsnToString,
} from '@faultline/utils';

/**
 * 用渲染后的事件创建一个信封
 *
 * @param event 渲染后的事件
 * @param dsn 客户端的 DSN，存在时写入信封头部
 * @param sdkInfo SDK 的元数据，存在时写入信封头部
 */
export function createEventEnvelope(
  event: RenderedEvent,
  dsn?: DsnComponents,
  sdkInfo?: SdkInfo,
): Envelope {
  const headers: EventEnvelopeHeaders = {
    event_id: event.event_id,
    sent_at: new Date().toISOString(),
    ...(sdkInfo && { sdk: sdkInfo }),
    ...(dsn && { dsn: dsnToString(dsn) }),
  };

  return createEnvelope(headers, [createEventEnvelopeItem(event)]);
}
