import type {
  Transport,
  TransportMakeRequestResponse,
  TransportOptions,
  TransportRequest,
} from '@faultline/types';
import { createTransport } from '@faultline/core';
import type { AxiosInstance } from 'axios';
import axios from 'axios';

/** Node 传输层的配置 */
export interface NodeTransportOptions extends TransportOptions {
  /** 发送请求使用的 axios 实例，默认使用全局实例 */
  axios?: AxiosInstance;
  /** 单次请求的超时时间（毫秒） */
  timeout?: number;
  /** 附加的请求头 */
  headers?: Record<string, string>;
}

/** 默认的请求超时时间 */
const DEFAULT_TIMEOUT = 30_000;

/**
 * 基于 axios 实现的传输层，把信封以 POST 请求发送到 DSN 对应的地址
 *
 * 非 2xx 的响应不会被当作异常抛出，状态码交给 createTransport 统一判断
 *
 * @param options 传输的配置选项
 */
export function makeNodeTransport(options: NodeTransportOptions): Transport {
  const client = options.axios || axios;

  function makeRequest(
    request: TransportRequest,
  ): PromiseLike<TransportMakeRequestResponse> {
    return client
      .post<unknown>(request.url, request.body, {
        headers: { ...options.headers, ...request.headers },
        timeout: options.timeout === undefined ? DEFAULT_TIMEOUT : options.timeout,
        // 所有状态码都作为正常响应返回
        validateStatus: () => true,
        // 请求体已经是编码好的文本，不需要 axios 再转换
        transformRequest: [(data: unknown) => data],
      })
      .then((response) => ({
        statusCode: response.status,
        body: response.data,
      }));
  }

  return createTransport(options, makeRequest);
}
