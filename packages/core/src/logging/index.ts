export { Logger, redactSecrets, silentLogger } from './logger.js';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './logger.js';
