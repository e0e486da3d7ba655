import type {
  EncodeResult,
  Envelope,
  EventEnvelopeHeaders,
  EventItem,
  JsonCodec,
  RenderedEvent,
} from '@faultline/types';

/**
 * 创建一个信封，信封由头部和一系列项目组成
 */
export function createEnvelope(
  headers: EventEnvelopeHeaders,
  items: EventItem[] = [],
): Envelope {
  return [headers, items];
}

/**
 * 把渲染后的事件包装成一个信封项目
 */
export function createEventEnvelopeItem(event: RenderedEvent): EventItem {
  return [{ type: 'event' }, event];
}

/**
 * 将信封序列化为按行分隔的文本：第一行是信封头部，之后每个项目占两行（项目头部和载荷）
 *
 * 任何一部分编码失败都会返回失败结果，而不是抛出异常
 */
export function serializeEnvelope(
  envelope: Envelope,
  codec: JsonCodec,
): EncodeResult {
  const [headers, items] = envelope;
  const lines: string[] = [];

  const parts: unknown[] = [headers];
  for (const [itemHeaders, payload] of items) {
    parts.push(itemHeaders, payload);
  }

  for (const part of parts) {
    const encoded = codec.encode(part);
    if (!encoded.ok) {
      return encoded;
    }
    lines.push(encoded.value);
  }

  return { ok: true, value: `${lines.join('\n')}\n` };
}
