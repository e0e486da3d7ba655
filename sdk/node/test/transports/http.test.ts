import type { Envelope } from '@faultline/types';
import { jsonCodec } from '@faultline/utils';
import { describe, expect, it } from 'vitest';

import { makeNodeTransport } from '../../src/transports/http';
import { TEST_DSN, makeFakeAxios } from '../helpers';

const ENVELOPE: Envelope = [
  { event_id: 'abc', sent_at: '2024-05-01T12:00:00.000Z' },
  [[{ type: 'event' }, { event_id: 'abc', message: 'hi' }]],
];

describe('makeNodeTransport', () => {
  it('posts the envelope to the DSN endpoint', async () => {
    const { instance, requests } = makeFakeAxios({ status: 200, data: { id: 'from-server' } });
    const transport = makeNodeTransport({
      dsn: TEST_DSN,
      codec: jsonCodec,
      axios: instance,
      headers: { 'User-Agent': 'faultline-test' },
    });

    await expect(transport.post(ENVELOPE, 0)).resolves.toEqual({
      ok: true,
      eventId: 'from-server',
    });

    const [request] = requests;
    expect(request.method).toBe('post');
    expect(request.url).toBe('https://errors.example.com/api/1/envelope/');
    expect(request.data).toBe(
      '{"event_id":"abc","sent_at":"2024-05-01T12:00:00.000Z"}\n' +
        '{"type":"event"}\n' +
        '{"event_id":"abc","message":"hi"}\n',
    );
    expect(request.timeout).toBe(30000);
    expect(request.headers.get('Content-Type')).toBe('application/x-faultline-envelope');
    expect(request.headers.get('X-Faultline-Auth')).toBe(
      'Faultline faultline_version=7, faultline_key=test-key',
    );
    expect(request.headers.get('User-Agent')).toBe('faultline-test');
  });

  it('hands error statuses to the retry policy instead of throwing', async () => {
    const { instance, requests } = makeFakeAxios({ status: 500, data: 'oops' });
    const transport = makeNodeTransport({ dsn: TEST_DSN, codec: jsonCodec, axios: instance });

    await expect(transport.post(ENVELOPE, 1)).resolves.toEqual({
      ok: false,
      reason: { type: 'request_failure', error: { statusCode: 500, body: 'oops' } },
    });
    expect(requests).toHaveLength(2);
  });

  it('reports network errors as request failures', async () => {
    const error = new Error('connect ECONNREFUSED');
    const { instance } = makeFakeAxios(error);
    const transport = makeNodeTransport({
      dsn: TEST_DSN,
      codec: jsonCodec,
      axios: instance,
      timeout: 500,
    });

    await expect(transport.post(ENVELOPE, 0)).resolves.toEqual({
      ok: false,
      reason: { type: 'request_failure', error },
    });
  });
});
