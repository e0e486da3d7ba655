import type {
  ClientOptions,
  DiagnosticLogLevel,
  JsonCodec,
  SendEventOptions,
  SendResultType,
} from '@faultline/types';
import { ConfigurationError, jsonCodec } from '@faultline/utils';

import type { HookInvoker } from './hooks';
import {
  AFTER_SEND_EVENT_ARITY,
  BEFORE_SEND_EVENT_ARITY,
  resolveHook,
} from './hooks';
import { parseSampleRate } from './utils/parseSampleRate';

/** 默认交给传输层的重试次数 */
export const DEFAULT_REQUEST_RETRIES = 4;

const SEND_RESULT_TYPES: readonly SendResultType[] = ['sync', 'none', 'async'];

const DIAGNOSTIC_LOG_LEVELS: readonly DiagnosticLogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'log',
];

/**
 * 客户端创建时校验过的配置，后续每次提交都直接使用
 */
export interface ResolvedClientOptions {
  sampleRate: number;
  sendResult: SendResultType;
  requestRetries: number;
  logLevel: DiagnosticLogLevel;
  jsonCodec: JsonCodec;
  random: () => number;
  beforeSendEvent?: HookInvoker;
  afterSendEvent?: HookInvoker;
}

/** 单次提交最终使用的配置 */
export interface ResolvedSendEventOptions {
  result: SendResultType;
  sampleRate: number;
  requestRetries: number;
}

/**
 * 校验客户端选项并填充默认值
 *
 * 钩子的形式在这里一次性校验，非法的配置会直接抛出 ConfigurationError
 */
export function resolveClientOptions(
  options: ClientOptions,
): ResolvedClientOptions {
  return {
    sampleRate: resolveSampleRate(options.sampleRate, 1),
    sendResult: resolveSendResult(options.sendResult, 'sync'),
    requestRetries: resolveRequestRetries(
      options.requestRetries,
      DEFAULT_REQUEST_RETRIES,
    ),
    logLevel: resolveLogLevel(options.logLevel),
    jsonCodec: options.jsonCodec || jsonCodec,
    random: options.random || Math.random,
    beforeSendEvent: resolveHook(
      'beforeSendEvent',
      options.beforeSendEvent,
      BEFORE_SEND_EVENT_ARITY,
    ),
    afterSendEvent: resolveHook(
      'afterSendEvent',
      options.afterSendEvent,
      AFTER_SEND_EVENT_ARITY,
    ),
  };
}

/**
 * 合并单次提交的覆盖配置和客户端配置
 */
export function resolveSendEventOptions(
  overrides: SendEventOptions,
  defaults: ResolvedClientOptions,
): ResolvedSendEventOptions {
  return {
    result: resolveSendResult(overrides.result, defaults.sendResult),
    sampleRate: resolveSampleRate(overrides.sampleRate, defaults.sampleRate),
    requestRetries: resolveRequestRetries(
      overrides.requestRetries,
      defaults.requestRetries,
    ),
  };
}

function resolveSampleRate(value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const rate = parseSampleRate(value);
  if (rate === undefined) {
    throw new ConfigurationError(
      `\`sampleRate\` must be a number between 0 and 1, got ${JSON.stringify(value)}`,
    );
  }
  return rate;
}

function resolveSendResult(
  value: unknown,
  fallback: SendResultType,
): SendResultType {
  if (value === undefined) {
    return fallback;
  }

  const sendResult = SEND_RESULT_TYPES.find((type) => type === value);
  if (!sendResult) {
    throw new ConfigurationError(
      `\`result\` must be one of ${SEND_RESULT_TYPES.join(', ')}, got ${JSON.stringify(value)}`,
    );
  }
  return sendResult;
}

function resolveRequestRetries(value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      `\`requestRetries\` must be a non-negative integer, got ${JSON.stringify(value)}`,
    );
  }
  return value;
}

function resolveLogLevel(value: unknown): DiagnosticLogLevel {
  if (value === undefined) {
    return 'warn';
  }

  const level = DIAGNOSTIC_LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigurationError(
      `\`logLevel\` must be one of ${DIAGNOSTIC_LOG_LEVELS.join(', ')}, got ${JSON.stringify(value)}`,
    );
  }
  return level;
}
