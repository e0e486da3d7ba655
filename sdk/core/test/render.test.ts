import type { Event } from '@faultline/types';
import { jsonCodec } from '@faultline/utils';
import { describe, expect, it } from 'vitest';

import { MAX_MESSAGE_LENGTH, renderEvent } from '../src/render';
import { makeEvent } from './helpers';

class Frame {
  public constructor(
    public filename: string,
    public lineno: number,
  ) {}

  public get location(): string {
    return `${this.filename}:${this.lineno}`;
  }
}

class Crumb {
  public category = 'http';
  public message = 'GET /health';
}

describe('renderEvent', () => {
  it('truncates the message to the maximum length', () => {
    const event = makeEvent({ message: 'a'.repeat(MAX_MESSAGE_LENGTH + 1) });

    const rendered = renderEvent(event, jsonCodec);

    expect(MAX_MESSAGE_LENGTH).toBe(8192);
    expect(rendered.message).toBe('a'.repeat(8192));
    expect(event.message).toHaveLength(8193);
  });

  it('keeps a message at the limit as it is', () => {
    const message = 'b'.repeat(8192);

    expect(renderEvent(makeEvent({ message }), jsonCodec).message).toBe(message);
  });

  it('removes internal and empty fields', () => {
    const event: Event = {
      event_id: 'abc',
      message: 'hi',
      release: undefined,
      source: 'manual',
      originalException: new Error('boom'),
    };

    const rendered = renderEvent(event, jsonCodec);

    expect(Object.keys(rendered)).toEqual(['event_id', 'message']);
    expect(event.source).toBe('manual');
  });

  it('drops empty request fields', () => {
    const rendered = renderEvent(
      makeEvent({
        request: {
          url: 'https://shop.example.com/cart',
          method: 'POST',
          data: undefined,
          headers: { accept: 'text/html' },
        },
      }),
      jsonCodec,
    );

    expect(rendered.request).toEqual({
      url: 'https://shop.example.com/cart',
      method: 'POST',
      headers: { accept: 'text/html' },
    });
    expect(rendered.request && 'data' in rendered.request).toBe(false);
  });

  it('sanitizes extra, user and tags', () => {
    const extra = { attempts: 3, handle: 10n };
    const rendered = renderEvent(
      makeEvent({
        extra,
        user: { id: 42, callback: function notify(): void {} },
        tags: { region: 'eu' },
      }),
      jsonCodec,
    );

    expect(rendered.extra).toEqual({ attempts: 3, handle: '[BigInt: 10]' });
    expect(rendered.user).toEqual({ id: 42, callback: '[Function: notify]' });
    expect(rendered.tags).toEqual({ region: 'eu' });
    expect(extra.handle).toBe(10n);
  });

  it('reuses maps that need no sanitizing', () => {
    const tags = { region: 'eu', retry: true };

    expect(renderEvent(makeEvent({ tags }), jsonCodec).tags).toBe(tags);
  });

  it('flattens exceptions, stack frames and breadcrumbs into plain objects', () => {
    const rendered = renderEvent(
      makeEvent({
        exception: [
          {
            type: 'TypeError',
            value: 'x is undefined',
            mechanism: { type: 'generic', handled: true },
            stacktrace: { frames: [new Frame('app.js', 10)] },
          },
        ],
        breadcrumbs: [new Crumb()],
      }),
      jsonCodec,
    );

    const [exception] = rendered.exception || [];
    const [frame] = (exception && exception.stacktrace && exception.stacktrace.frames) || [];

    expect(exception).toEqual({
      type: 'TypeError',
      value: 'x is undefined',
      mechanism: { type: 'generic', handled: true },
      stacktrace: { frames: [{ filename: 'app.js', lineno: 10 }] },
    });
    expect(Object.getPrototypeOf(frame)).toBe(Object.prototype);
    expect(rendered.breadcrumbs).toEqual([{ category: 'http', message: 'GET /health' }]);
    expect(Object.getPrototypeOf((rendered.breadcrumbs || [])[0])).toBe(Object.prototype);
  });

  it('uses the given codec to decide what needs sanitizing', () => {
    const strict = {
      encode: (value: unknown) =>
        typeof value === 'object'
          ? { ok: false as const, error: new Error('objects not allowed') }
          : jsonCodec.encode(value),
    };

    const rendered = renderEvent(
      makeEvent({ extra: { when: new Date(0), count: 1 } }),
      strict,
    );

    expect(rendered.extra).toEqual({ when: '1970-01-01T00:00:00.000Z', count: 1 });
  });

  it('sends errors, sets and maps in extra as readable text', () => {
    const rendered = renderEvent(
      makeEvent({
        extra: { err: new Error('boom'), seen: new Set([1, 2]), m: new Map([['a', 1]]) },
      }),
      jsonCodec,
    );

    expect(rendered.extra).toEqual({
      err: 'Error: boom',
      seen: 'Set(2) { 1, 2 }',
      m: 'Map(1) { "a" => 1 }',
    });
    expect(jsonCodec.encode(rendered.extra)).toEqual({
      ok: true,
      value: '{"err":"Error: boom","seen":"Set(2) { 1, 2 }","m":"Map(1) { \\"a\\" => 1 }"}',
    });
  });
});
