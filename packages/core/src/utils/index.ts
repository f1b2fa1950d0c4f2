export { toSnakeCase, toKebabCase, toScreamingSnakeCase, identity, resolveNamingPolicy } from './naming.js';
export { deepEqual } from './deep-equal.js';
export { Logger, silentLogger } from './logger.js';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './logger.js';
