import type {
  DiagnosticLogLevel,
  Event,
  Logger,
  SendFailureReason,
} from '@faultline/types';
import { inspect, isError } from '@faultline/utils';

/**
 * 为发送失败的原因生成一行可读的诊断信息
 *
 * 请求失败时如果拿到的是带堆栈的 Error，直接输出堆栈
 */
export function formatSendFailure(reason: SendFailureReason): string {
  switch (reason.type) {
    case 'invalid_dsn':
      return 'Cannot send event because of invalid DSN';
    case 'invalid_json':
      return `Unable to encode JSON event - ${inspect(reason.error)}`;
    case 'request_failure':
      if (isError(reason.error) && reason.error.stack) {
        return reason.error.stack;
      }
      return `Error in HTTP Request - ${inspect(reason.error)}`;
  }
}

/**
 * 输出发送失败的诊断日志
 *
 * 由日志系统产生的事件不输出，否则日志和上报会互相触发形成循环
 */
export function logSendFailure(
  logger: Logger,
  level: DiagnosticLogLevel,
  reason: SendFailureReason,
  event: Event,
): void {
  if (event.source === 'logger') {
    return;
  }

  logger[level](`Failed to send event. ${formatSendFailure(reason)}`);
}
