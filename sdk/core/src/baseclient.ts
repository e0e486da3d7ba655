import type {
  Client,
  ClientOptions,
  DsnComponents,
  Envelope,
  Event,
  EventSender,
  LastEventStore,
  Logger,
  RenderedEvent,
  SendEventOptions,
  SendEventResult,
  SendFailureReason,
  SendResultType,
  Transport,
  TransportPostResult,
} from '@faultline/types';
import { ConfigurationError, logger, makeDsn, makeLogger } from '@faultline/utils';

import { DEBUG_BUILD } from './debug-build';
import { createEventEnvelope } from './envelope';
import { callBeforeSendEvent } from './hooks';
import { getDefaultLastEventStore } from './lastEvent';
import type { ResolvedClientOptions } from './options';
import { resolveClientOptions, resolveSendEventOptions } from './options';
import { renderEvent } from './render';
import { sampleEvent } from './sampling';
import { logSendFailure } from './sendResult';
import { createBufferedSender } from './transports/sender';

/**
 * 使用已经退役的 async 发送方式时抛出的错误信息
 */
const ASYNC_RESULT_UNSUPPORTED =
  'the `async` result type is not supported anymore. Instead, start your own ' +
  'concurrent task (for example with `queueMicrotask` or a worker) that calls ' +
  '`sendEvent` with `result: "sync"`. The effect is exactly the same.';

/**
 * 这个类是所有平台客户端的基础实现，负责执行事件管道：
 * 采样 → 发送前钩子 → 渲染并发送 → 发送后钩子
 *
 * 选项在构造函数中一次性校验，钩子的形式不对会直接抛出 ConfigurationError。
 * 可以使用 {@link BaseClient.getOptions} 访问传入的选项
 *
 * 被采样丢弃或被钩子丢弃的事件不会被渲染，也不会调用传输层和发送后钩子
 *
 * @example
 * class NodeClient extends BaseClient<NodeOptions> {
 *   public constructor(options: NodeOptions) {
 *     super(options);
 *   }
 * }
 */
export abstract class BaseClient<O extends ClientOptions> implements Client<O> {
  /** 保存传递给 SDK 的选项 */
  protected readonly _options: O;

  /** 校验并填充了默认值的选项 */
  protected readonly _resolvedOptions: ResolvedClientOptions;

  /** 客户端的 DSN，用于写入信封头部 */
  protected readonly _dsn?: DsnComponents;

  /** 传输层的实现，用于阻塞发送 */
  protected readonly _transport?: Transport;

  /** 不等待结果的异步发送器 */
  protected readonly _sender?: EventSender;

  /** 记录最近一次发送的事件 */
  protected readonly _lastEventStore: LastEventStore;

  /** 输出发送失败诊断日志 */
  protected readonly _logger: Logger;

  /**
   * 用于初始化客户端实例
   *
   * @param options Options for the client.
   */
  protected constructor(options: O) {
    this._options = options;
    this._resolvedOptions = resolveClientOptions(options);
    this._lastEventStore = options.lastEventStore || getDefaultLastEventStore();
    this._logger = options.logger || makeLogger(undefined, true);

    if (options.dsn) {
      this._dsn = makeDsn(options.dsn);
    } else {
      DEBUG_BUILD && logger.warn('No DSN provided, client will not send events.');
    }

    if (options.transport) {
      this._transport = options.transport({
        dsn: options.dsn,
        codec: this._resolvedOptions.jsonCodec,
        sdk: options._metadata && options._metadata.sdk,
      });
    }

    this._sender =
      options.sender ||
      (this._transport &&
        createBufferedSender(this._transport, {
          bufferSize: options.bufferSize,
          retries: this._resolvedOptions.requestRetries,
        }));
  }

  /**
   * @inheritDoc
   */
  public getOptions(): O {
    return this._options;
  }

  /**
   * 获取传输层实例
   */
  public getTransport(): Transport | undefined {
    return this._transport;
  }

  /**
   * 提交一个事件并返回结果
   *
   * 采样丢弃返回 `unsampled`，发送前钩子丢弃返回 `excluded`，两者都不会抛出异常；
   * 投递失败作为 `error` 结果返回。配置错误（非法的覆盖配置、退役的 async 方式）
   * 会在调用时同步抛出，不会发起任何请求
   *
   * @param event 已经完整填充的事件
   * @param options 本次提交的覆盖配置
   */
  public sendEvent(
    event: Event,
    options: SendEventOptions = {},
  ): PromiseLike<SendEventResult> {
    const { result, sampleRate, requestRetries } = resolveSendEventOptions(
      options,
      this._resolvedOptions,
    );

    if (!sampleEvent(sampleRate, this._resolvedOptions.random)) {
      DEBUG_BUILD &&
        logger.log(
          `Discarding event because it's not included in the random sample (sampling rate = ${sampleRate})`,
        );
      return Promise.resolve<SendEventResult>({ status: 'unsampled' });
    }

    const processedEvent = callBeforeSendEvent(
      this._resolvedOptions.beforeSendEvent,
      event,
    );
    if (!processedEvent) {
      DEBUG_BUILD &&
        logger.log('`beforeSendEvent` returned a falsy value, will not send event.');
      return Promise.resolve<SendEventResult>({ status: 'excluded' });
    }

    return this._encodeAndSend(processedEvent, result, requestRetries).then(
      (sendResult) => {
        this._callAfterSendEvent(processedEvent, sendResult);
        return sendResult;
      },
    );
  }

  /**
   * @inheritDoc
   */
  public renderEvent(event: Event): RenderedEvent {
    return renderEvent(event, this._resolvedOptions.jsonCodec);
  }

  /**
   * @inheritDoc
   */
  public lastEventId(): string | undefined {
    return this._lastEventStore.lastEventId();
  }

  /**
   * 等待异步发送器中所有的信封发送完成
   *
   * @param timeout 超时时间（毫秒），超时返回 false
   */
  public flush(timeout?: number): PromiseLike<boolean> {
    return this._sender ? this._sender.flush(timeout) : Promise.resolve(true);
  }

  /**
   * 根据完成方式把事件交给传输层
   *
   * async 方式在这里同步抛出，保证不会发起任何请求
   */
  protected _encodeAndSend(
    event: Event,
    resultType: SendResultType,
    requestRetries: number,
  ): PromiseLike<SendEventResult> {
    switch (resultType) {
      case 'async':
        throw new ConfigurationError(ASYNC_RESULT_UNSUPPORTED);
      case 'sync':
        return this._sendAndWait(event, requestRetries);
      case 'none':
        return Promise.resolve(this._sendWithoutWaiting(event));
    }
  }

  /**
   * 阻塞发送：等待传输层的结果，成功时记录事件 ID，失败时输出诊断日志
   */
  protected _sendAndWait(
    event: Event,
    requestRetries: number,
  ): PromiseLike<SendEventResult> {
    const envelope = this._createEnvelope(event);

    const posted: PromiseLike<TransportPostResult> = this._transport
      ? this._transport.post(envelope, requestRetries)
      : Promise.resolve<TransportPostResult>({
          ok: false,
          reason: { type: 'invalid_dsn' },
        });

    return posted
      .then(
        (postResult) => postResult,
        // 传输层不应该抛出异常，真的抛出时也只作为请求失败处理
        (error: unknown): TransportPostResult => ({
          ok: false,
          reason: { type: 'request_failure', error },
        }),
      )
      .then((postResult): SendEventResult => {
        if (postResult.ok) {
          this._lastEventStore.record(event.event_id, event.source);
          return { status: 'ok', eventId: postResult.eventId };
        }

        this._logSendFailure(postResult.reason, event);
        return { status: 'error', reason: postResult.reason };
      });
  }

  /**
   * 异步发送：交给发送器后立即返回，拿不到服务端确认，所以事件 ID 为空字符串
   */
  protected _sendWithoutWaiting(event: Event): SendEventResult {
    const envelope = this._createEnvelope(event);

    if (this._sender) {
      this._sender.sendAsync(envelope);
    } else {
      DEBUG_BUILD && logger.warn('Transport disabled, event will not be sent.');
    }

    this._lastEventStore.record(event.event_id, event.source);
    return { status: 'ok', eventId: '' };
  }

  /**
   * 渲染事件并包装成信封
   */
  protected _createEnvelope(event: Event): Envelope {
    return createEventEnvelope(
      this.renderEvent(event),
      this._dsn,
      this._options._metadata && this._options._metadata.sdk,
    );
  }

  /**
   * 调用发送后钩子，返回值被忽略，抛出的异常会传给调用方
   */
  protected _callAfterSendEvent(event: Event, result: SendEventResult): void {
    const { afterSendEvent } = this._resolvedOptions;
    if (afterSendEvent) {
      afterSendEvent(event, result);
    }
  }

  /**
   * 输出发送失败的诊断日志
   */
  protected _logSendFailure(reason: SendFailureReason, event: Event): void {
    logSendFailure(this._logger, this._resolvedOptions.logLevel, reason, event);
  }
}
