import type {
  Envelope,
  TransportMakeRequestResponse,
  TransportRequest,
} from '@faultline/types';
import { jsonCodec } from '@faultline/utils';
import { describe, expect, it } from 'vitest';

import { createTransport } from '../../src/transports/base';

const DSN = 'https://test-key@errors.example.com/1';

const ENVELOPE: Envelope = [
  { event_id: 'abc', sent_at: '2024-05-01T12:00:00.000Z' },
  [[{ type: 'event' }, { event_id: 'abc', message: 'hi' }]],
];

/**
 * 按顺序返回给定响应的请求函数，Error 会作为拒绝的原因
 */
function makeExecutor(...responses: Array<TransportMakeRequestResponse | Error>) {
  const requests: TransportRequest[] = [];

  const executor = (request: TransportRequest): PromiseLike<TransportMakeRequestResponse> => {
    const response = responses[Math.min(requests.length, responses.length - 1)];
    requests.push(request);
    return response instanceof Error ? Promise.reject(response) : Promise.resolve(response);
  };

  return { executor, requests };
}

describe('createTransport', () => {
  it('fails without a DSN and sends nothing', async () => {
    const { executor, requests } = makeExecutor({ statusCode: 200 });

    await expect(createTransport({ codec: jsonCodec }, executor).post(ENVELOPE, 3)).resolves.toEqual({
      ok: false,
      reason: { type: 'invalid_dsn' },
    });
    await expect(
      createTransport({ dsn: 'not a dsn', codec: jsonCodec }, executor).post(ENVELOPE, 3),
    ).resolves.toEqual({ ok: false, reason: { type: 'invalid_dsn' } });
    expect(requests).toHaveLength(0);
  });

  it('fails when the envelope cannot be encoded', async () => {
    const { executor, requests } = makeExecutor({ statusCode: 200 });
    const envelope: Envelope = [ENVELOPE[0], [[{ type: 'event' }, { event_id: 'abc', extra: { n: 1n } }]]];

    const result = await createTransport({ dsn: DSN, codec: jsonCodec }, executor).post(envelope, 0);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason.type).toBe('invalid_json');
    }
    expect(requests).toHaveLength(0);
  });

  it('posts the serialized envelope with auth headers', async () => {
    const { executor, requests } = makeExecutor({ statusCode: 200 });
    const transport = createTransport(
      { dsn: DSN, codec: jsonCodec, sdk: { name: 'faultline.javascript.node', version: '0.4.0' } },
      executor,
    );

    await transport.post(ENVELOPE, 0);

    expect(requests).toEqual([
      {
        url: 'https://errors.example.com/api/1/envelope/',
        body:
          '{"event_id":"abc","sent_at":"2024-05-01T12:00:00.000Z"}\n' +
          '{"type":"event"}\n' +
          '{"event_id":"abc","message":"hi"}\n',
        headers: {
          'Content-Type': 'application/x-faultline-envelope',
          'X-Faultline-Auth':
            'Faultline faultline_version=7, faultline_client=faultline.javascript.node/0.4.0, faultline_key=test-key',
        },
      },
    ]);
  });

  it('uses the id from the response body when there is one', async () => {
    const withId = makeExecutor({ statusCode: 200, body: { id: 'from-server' } });
    const withoutId = makeExecutor({ statusCode: 202, body: '' });

    await expect(
      createTransport({ dsn: DSN, codec: jsonCodec }, withId.executor).post(ENVELOPE, 0),
    ).resolves.toEqual({ ok: true, eventId: 'from-server' });
    await expect(
      createTransport({ dsn: DSN, codec: jsonCodec }, withoutId.executor).post(ENVELOPE, 0),
    ).resolves.toEqual({ ok: true, eventId: 'abc' });
  });

  it('retries server errors up to the given count', async () => {
    const { executor, requests } = makeExecutor({ statusCode: 500, body: 'oops' });

    const result = await createTransport({ dsn: DSN, codec: jsonCodec }, executor).post(ENVELOPE, 2);

    expect(requests).toHaveLength(3);
    expect(result).toEqual({
      ok: false,
      reason: { type: 'request_failure', error: { statusCode: 500, body: 'oops' } },
    });
  });

  it('stops retrying once a request succeeds', async () => {
    const { executor, requests } = makeExecutor(
      { statusCode: 429 },
      { statusCode: 503 },
      { statusCode: 200 },
    );

    const result = await createTransport({ dsn: DSN, codec: jsonCodec }, executor).post(ENVELOPE, 4);

    expect(requests).toHaveLength(3);
    expect(result).toEqual({ ok: true, eventId: 'abc' });
  });

  it('does not retry client errors', async () => {
    const { executor, requests } = makeExecutor({ statusCode: 400, body: 'bad envelope' });

    const result = await createTransport({ dsn: DSN, codec: jsonCodec }, executor).post(ENVELOPE, 3);

    expect(requests).toHaveLength(1);
    expect(result).toEqual({
      ok: false,
      reason: { type: 'request_failure', error: { statusCode: 400, body: 'bad envelope' } },
    });
  });

  it('retries thrown errors and reports the last one', async () => {
    const first = new Error('ECONNRESET');
    const second = new Error('ETIMEDOUT');
    const { executor, requests } = makeExecutor(first, second);

    const result = await createTransport({ dsn: DSN, codec: jsonCodec }, executor).post(ENVELOPE, 1);

    expect(requests).toHaveLength(2);
    expect(result).toEqual({ ok: false, reason: { type: 'request_failure', error: second } });
  });

  it('makes a single attempt with zero retries', async () => {
    const { executor, requests } = makeExecutor(new Error('ECONNREFUSED'));

    await createTransport({ dsn: DSN, codec: jsonCodec }, executor).post(ENVELOPE, 0);

    expect(requests).toHaveLength(1);
  });
});
