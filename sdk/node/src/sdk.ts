import { initAndBind } from '@faultline/core';

import type { NodeClientOptions } from './client';
import { NodeClient } from './client';

/**
 * 初始化 Node SDK，创建客户端并绑定为当前进程的客户端
 *
 * @example
 * ```
 * import { init, sendEvent } from '@faultline/node';
 *
 * init({
 *   dsn: 'https://public@errors.example.com/1',
 *   sampleRate: 0.5,
 *   beforeSendEvent: (event) => (event.level === 'debug' ? null : event),
 * });
 * ```
 */
export function init(options: NodeClientOptions = {}): NodeClient {
  return initAndBind(NodeClient, options);
}
