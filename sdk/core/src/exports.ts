import type {
  Event,
  RenderedEvent,
  SendEventOptions,
  SendEventResult,
} from '@faultline/types';
import { jsonCodec, logger } from '@faultline/utils';

import { DEBUG_BUILD } from './debug-build';
import { getDefaultLastEventStore } from './lastEvent';
import { renderEvent as renderEventWithCodec } from './render';
import { getClient } from './sdk';

/**
 * 使用当前绑定的客户端提交一个事件
 *
 * 没有绑定客户端时不会发送，返回 invalid_dsn 失败
 *
 * @param event 已经完整填充的事件
 * @param options 本次提交的覆盖配置
 */
export function sendEvent(
  event: Event,
  options?: SendEventOptions,
): PromiseLike<SendEventResult> {
  const client = getClient();
  if (!client) {
    DEBUG_BUILD && logger.warn('No client bound, event will not be sent.');
    return Promise.resolve<SendEventResult>({
      status: 'error',
      reason: { type: 'invalid_dsn' },
    });
  }

  return client.sendEvent(event, options);
}

/**
 * 把事件渲染成最终上报的载荷，但不提交
 *
 * 没有绑定客户端时使用默认的 JSON 序列化工具
 */
export function renderEvent(event: Event): RenderedEvent {
  const client = getClient();
  return client ? client.renderEvent(event) : renderEventWithCodec(event, jsonCodec);
}

/**
 * 最近一次交给传输层的事件 ID
 */
export function lastEventId(): string | undefined {
  const client = getClient();
  return client ? client.lastEventId() : getDefaultLastEventStore().lastEventId();
}

/**
 * 等待当前客户端所有的异步发送完成
 *
 * @param timeout 超时时间（毫秒）
 */
export function flush(timeout?: number): PromiseLike<boolean> {
  const client = getClient();
  if (!client) {
    DEBUG_BUILD && logger.warn('Cannot flush events. No client defined.');
    return Promise.resolve(false);
  }

  return client.flush(timeout);
}
