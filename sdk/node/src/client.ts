import type { ClientOptions } from '@faultline/types';
import { BaseClient, applySdkMetadata } from '@faultline/core';

import type { NodeTransportOptions } from './transports/http';
import { makeNodeTransport } from './transports/http';

/**
 * Node 客户端的配置选项
 */
export interface NodeClientOptions extends ClientOptions {
  /** 传给默认 axios 传输层的额外配置 */
  transportOptions?: Omit<NodeTransportOptions, 'dsn' | 'codec' | 'sdk'>;
}

/**
 * Node SDK 客户端
 *
 * 没有传入 transport 时使用基于 axios 的 HTTP 传输层
 */
export class NodeClient extends BaseClient<NodeClientOptions> {
  /**
   * 创建一个 Node 客户端实例
   *
   * @param options 此SDK的配置选项
   */
  public constructor(options: NodeClientOptions) {
    const opts: NodeClientOptions = {
      ...options,
      transport:
        options.transport ||
        ((transportOptions) =>
          makeNodeTransport({ ...options.transportOptions, ...transportOptions })),
    };

    // 应用元数据
    applySdkMetadata(opts, 'node');

    super(opts);
  }
}
