import type {
  ClientOptions,
  ConsoleLevel,
  Envelope,
  Event,
  Logger,
  Transport,
  TransportPostResult,
} from '@faultline/types';

import { BaseClient } from '../src/baseclient';
import { makeLastEventStore } from '../src/lastEvent';

export const TEST_DSN = 'https://test-key@errors.example.com/1';

export class TestClient extends BaseClient<ClientOptions> {
  public constructor(options: ClientOptions) {
    super(options);
  }
}

export interface RecordedPost {
  envelope: Envelope;
  retries: number;
}

/**
 * 记录每次提交的传输层，按顺序返回给定的结果，用完后重复最后一个
 */
export function makeRecordingTransport(
  ...results: Array<TransportPostResult | Error>
): { transport: Transport; posts: RecordedPost[] } {
  const posts: RecordedPost[] = [];
  const fallback: TransportPostResult = { ok: true, eventId: 'server-id' };
  const queue = results.length ? results : [fallback];

  const transport: Transport = {
    post(envelope, retries) {
      const next = queue[Math.min(posts.length, queue.length - 1)];
      posts.push({ envelope, retries });
      return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
    },
  };

  return { transport, posts };
}

export type LoggedLine = [level: ConsoleLevel, args: unknown[]];

export function makeRecordingLogger(): { logger: Logger; lines: LoggedLine[] } {
  const lines: LoggedLine[] = [];
  const method =
    (level: ConsoleLevel) =>
    (...args: unknown[]): void => {
      lines.push([level, args]);
    };

  const logger: Logger = {
    enable: () => undefined,
    disable: () => undefined,
    isEnabled: () => true,
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    log: method('log'),
    assert: method('assert'),
    trace: method('trace'),
  };

  return { logger, lines };
}

export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    event_id: 'c0ffee0000000000000000000000beef',
    message: 'Something broke',
    level: 'error',
    ...overrides,
  };
}

/** 客户端的基础选项：不输出到控制台的日志、独立的最近事件存储 */
export function makeTestOptions(
  transport: Transport,
  options: ClientOptions = {},
): ClientOptions {
  return {
    dsn: TEST_DSN,
    transport: () => transport,
    logger: makeRecordingLogger().logger,
    lastEventStore: makeLastEventStore(),
    ...options,
  };
}
