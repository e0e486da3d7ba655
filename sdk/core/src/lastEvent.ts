import type { EventSource, LastEventStore } from '@faultline/types';

import { getSdkCarrier } from './carrier';

/**
 * 创建一个只保存一条记录的存储，后写入的覆盖先写入的
 *
 * 这个值只用于诊断（例如在日志或页面上展示最近一次上报的 ID），
 * 并发提交之间不保证顺序
 */
export function makeLastEventStore(): LastEventStore {
  let eventId: string | undefined;
  let source: EventSource | undefined;

  return {
    record(id, eventSource) {
      eventId = id;
      source = eventSource;
    },
    lastEventId: () => eventId,
    lastEventSource: () => source,
  };
}

/**
 * 进程内共享的默认存储，客户端没有注入存储时使用
 */
export function getDefaultLastEventStore(): LastEventStore {
  const carrier = getSdkCarrier();
  return (carrier.lastEventStore = carrier.lastEventStore || makeLastEventStore());
}
