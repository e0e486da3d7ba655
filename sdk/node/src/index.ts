export type {
  Breadcrumb,
  ClientOptions,
  Event,
  EventSource,
  Exception,
  RenderedEvent,
  Request,
  SdkInfo,
  SendEventOptions,
  SendEventResult,
  SendFailureReason,
  SeverityLevel,
  StackFrame,
  Stacktrace,
  User,
} from '@faultline/types';

export {
  flush,
  getClient,
  lastEventId,
  renderEvent,
  sendEvent,
} from '@faultline/core';

export { NodeClient } from './client';
export type { NodeClientOptions } from './client';
export { init } from './sdk';
export { makeNodeTransport } from './transports/http';
export type { NodeTransportOptions } from './transports/http';
