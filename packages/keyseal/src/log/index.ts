/**
 * Logging barrel export.
 */

export { createLogger, formatRecord, isLevelEnabled, isLogLevel, silentLogger } from './logger.js'
export type { Logger, LogSink, CreateLoggerOptions } from './logger.js'
export { FileLogSink, StreamLogSink, MemoryLogSink } from './sinks.js'
export type { TextStream, LogSinkOptions } from './sinks.js'
