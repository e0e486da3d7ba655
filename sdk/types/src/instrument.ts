/** 控制台支持的日志级别 */
export type ConsoleLevel =
  | 'debug'
  | 'info'
  | 'warn'
  | 'error'
  | 'log'
  | 'assert'
  | 'trace';
