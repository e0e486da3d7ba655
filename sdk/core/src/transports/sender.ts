import type {
  Envelope,
  EventSender,
  Transport,
  TransportPostResult,
} from '@faultline/types';
import { SdkError, logger, makePromiseBuffer } from '@faultline/utils';

import { DEBUG_BUILD } from '../debug-build';
import { formatSendFailure } from '../sendResult';

export const DEFAULT_TRANSPORT_BUFFER_SIZE = 64;

export interface BufferedSenderOptions {
  /** 最多同时处理的信封数量 */
  bufferSize?: number;
  /** 交给传输层的重试次数 */
  retries?: number;
}

/**
 * 创建一个不等待结果的异步发送器
 *
 * 信封交给 Promise 缓冲区后立即返回，缓冲区满时直接丢弃；
 * 发送失败只会写入调试日志，不会影响调用方
 *
 * @param transport 实际发送信封的传输层
 */
export function createBufferedSender(
  transport: Transport,
  options: BufferedSenderOptions = {},
): EventSender {
  const { bufferSize = DEFAULT_TRANSPORT_BUFFER_SIZE, retries = 0 } = options;
  const buffer = makePromiseBuffer<TransportPostResult>(bufferSize);

  function sendAsync(envelope: Envelope): void {
    void buffer.add(() => transport.post(envelope, retries)).then(
      (result) => {
        if (!result.ok) {
          DEBUG_BUILD &&
            logger.warn(
              `Failed to send event asynchronously. ${formatSendFailure(result.reason)}`,
            );
        }
      },
      (error: unknown) => {
        // 缓冲区满了，会得到 SdkError
        if (error instanceof SdkError) {
          DEBUG_BUILD &&
            logger.error('Skipped sending event because buffer is full.');
        } else {
          DEBUG_BUILD && logger.error('Failed to send event asynchronously.', error);
        }
      },
    );
  }

  return {
    sendAsync,
    flush: (timeout) => buffer.drain(timeout),
  };
}
