export type { ClientClass } from './sdk';
export type { HookInvoker } from './hooks';
export type { ResolvedClientOptions, ResolvedSendEventOptions } from './options';
export type { BufferedSenderOptions } from './transports/sender';

export { BaseClient } from './baseclient';
export { initAndBind, setCurrentClient, getClient } from './sdk';
export { sendEvent, renderEvent, lastEventId, flush } from './exports';
export { createEventEnvelope } from './envelope';
export { makeLastEventStore, getDefaultLastEventStore } from './lastEvent';
export { MAX_MESSAGE_LENGTH } from './render';
export { sampleEvent } from './sampling';
export {
  callBeforeSendEvent,
  isHookMethodRef,
  resolveHook,
} from './hooks';
export { formatSendFailure, logSendFailure } from './sendResult';
export {
  DEFAULT_REQUEST_RETRIES,
  resolveClientOptions,
  resolveSendEventOptions,
} from './options';
export { parseSampleRate } from './utils/parseSampleRate';
export { createTransport } from './transports/base';
export {
  DEFAULT_TRANSPORT_BUFFER_SIZE,
  createBufferedSender,
} from './transports/sender';
export { applySdkMetadata } from './utils/sdkMetadata';
