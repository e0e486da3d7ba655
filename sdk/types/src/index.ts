export type { Breadcrumb } from './breadcrumb';
export type {
  AfterSendEventHook,
  BeforeSendEventHook,
  Client,
  ClientOptions,
  DiagnosticLogLevel,
  HookCallable,
  HookMethodRef,
  LastEventStore,
  SendEventOptions,
  SendEventResult,
  SendResultType,
} from './client';
export type { EncodeResult, JsonCodec } from './codec';
export type { DsnComponents, DsnLike, DsnProtocol } from './dsn';
export type {
  Envelope,
  EventEnvelopeHeaders,
  EventItem,
  EventItemHeaders,
} from './envelope';
export type {
  Event,
  EventSource,
  NonPayloadEventKey,
  RenderedEvent,
} from './event';
export type { Exception } from './exception';
export type { Extra, Extras } from './extra';
export type { ConsoleLevel } from './instrument';
export type { Logger, LoggerMethod } from './logger';
export type { Mechanism } from './mechanism';
export type { Package } from './package';
export type { QueryParams, Request } from './request';
export type { SdkInfo } from './sdkinfo';
export type { SeverityLevel } from './severity';
export type { StackFrame } from './stackframe';
export type { Stacktrace } from './stacktrace';
export type {
  EventSender,
  SendFailureReason,
  Transport,
  TransportMakeRequestResponse,
  TransportOptions,
  TransportPostResult,
  TransportRequest,
  TransportRequestExecutor,
} from './transport';
export type { User } from './user';
