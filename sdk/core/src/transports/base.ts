import type {
  DsnComponents,
  Envelope,
  SdkInfo,
  Transport,
  TransportMakeRequestResponse,
  TransportOptions,
  TransportPostResult,
  TransportRequest,
  TransportRequestExecutor,
} from '@faultline/types';
import {
  getEnvelopeEndpoint,
  isPlainObject,
  logger,
  makeDsn,
  serializeEnvelope,
} from '@faultline/utils';

import { DEBUG_BUILD } from '../debug-build';

/** 信封请求的内容类型 */
const ENVELOPE_CONTENT_TYPE = 'application/x-faultline-envelope';

/**
 * 用于创建 Transport 实例，负责把信封从客户端发送到服务端
 *
 * 这里处理 DSN 校验、信封编码、响应状态码和重试，真正的网络请求由 makeRequest 完成；
 * 重试之间没有退避等待
 *
 * @param options 传输层选项，包含 DSN 和序列化工具
 * @param makeRequest 发送请求的执行函数
 */
export function createTransport(
  options: TransportOptions,
  makeRequest: TransportRequestExecutor,
): Transport {
  const dsn = options.dsn ? makeDsn(options.dsn) : undefined;

  /**
   * 发送一个信封，最多尝试 retries + 1 次
   */
  function post(
    envelope: Envelope,
    retries: number,
  ): PromiseLike<TransportPostResult> {
    // 没有有效的 DSN 时不会发出任何请求
    if (!dsn) {
      return Promise.resolve<TransportPostResult>({
        ok: false,
        reason: { type: 'invalid_dsn' },
      });
    }

    const body = serializeEnvelope(envelope, options.codec);
    if (!body.ok) {
      return Promise.resolve<TransportPostResult>({
        ok: false,
        reason: { type: 'invalid_json', error: body.error },
      });
    }

    const request: TransportRequest = {
      url: getEnvelopeEndpoint(dsn),
      body: body.value,
      headers: {
        'Content-Type': ENVELOPE_CONTENT_TYPE,
        'X-Faultline-Auth': getAuthHeader(dsn, options.sdk),
      },
    };

    const fail = (
      remaining: number,
      error: unknown,
    ): PromiseLike<TransportPostResult> | TransportPostResult =>
      remaining > 0
        ? attempt(remaining - 1)
        : { ok: false, reason: { type: 'request_failure', error } };

    const attempt = (remaining: number): PromiseLike<TransportPostResult> =>
      makeRequest(request).then(
        (response): PromiseLike<TransportPostResult> | TransportPostResult => {
          if (isSuccessfulResponse(response)) {
            return {
              ok: true,
              eventId: getEventIdFromResponse(response) || envelope[0].event_id,
            };
          }

          DEBUG_BUILD &&
            logger.warn(
              `Server responded with status code ${response.statusCode} to sent event.`,
            );

          const error = { statusCode: response.statusCode, body: response.body };
          // 除了限流以外的 4xx 说明请求本身有问题，重试没有意义
          return isRetryableStatus(response.statusCode)
            ? fail(remaining, error)
            : fail(0, error);
        },
        (error: unknown): PromiseLike<TransportPostResult> | TransportPostResult =>
          fail(remaining, error),
      );

    return attempt(retries);
  }

  return { post };
}

/** 没有状态码时视为成功，例如请求被其他机制接管 */
function isSuccessfulResponse(response: TransportMakeRequestResponse): boolean {
  const { statusCode } = response;
  return statusCode === undefined || (statusCode >= 200 && statusCode < 300);
}

function isRetryableStatus(statusCode: number | undefined): boolean {
  return statusCode === undefined || statusCode === 429 || statusCode >= 500;
}

/** 服务端在响应体中返回事件 ID 时优先使用它 */
function getEventIdFromResponse(
  response: TransportMakeRequestResponse,
): string | undefined {
  const { body } = response;
  return isPlainObject(body) && typeof body.id === 'string' ? body.id : undefined;
}

/**
 * 生成鉴权请求头
 */
function getAuthHeader(dsn: DsnComponents, sdk?: SdkInfo): string {
  const params = [
    'faultline_version=7',
    ...(sdk ? [`faultline_client=${sdk.name}/${sdk.version}`] : []),
    `faultline_key=${dsn.publicKey || ''}`,
  ];
  return `Faultline ${params.join(', ')}`;
}
