export * from './dsn';
export * from './envelope';
export * from './error';
export * from './inspect';
export * from './is';
export * from './json';
export * from './logger';
export * from './object';
export * from './promisebuffer';
export * from './sanitize';
export * from './stacktrace';
export * from './string';
export * from './version';
export * from './worldwide';
