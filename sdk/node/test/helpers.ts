import type { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import axios from 'axios';

export const TEST_DSN = 'https://test-key@errors.example.com/1';

export interface FakeResponse {
  status: number;
  data?: unknown;
}

/**
 * 创建一个不访问网络的 axios 实例，按顺序返回给定的响应，Error 会作为拒绝的原因
 */
export function makeFakeAxios(...responses: Array<FakeResponse | Error>): {
  instance: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];

  const instance = axios.create({
    adapter: (config) => {
      const response = responses[Math.min(requests.length, responses.length - 1)];
      requests.push(config);

      if (response instanceof Error) {
        return Promise.reject(response);
      }

      return Promise.resolve({
        data: response.data,
        status: response.status,
        statusText: '',
        headers: {},
        config,
      });
    },
  });

  return { instance, requests };
}
