/**
 * Structured logging routed through append-only sinks.
 *
 * Core operations never write to a global buffer or the console directly;
 * they receive a {@link Logger} and every record is fanned out to the sinks
 * the caller configured (a log file, stderr, an in-memory transcript).
 *
 * @example
 * ```ts
 * const sink = new MemoryLogSink()
 * const logger = createLogger({ name: 'keyseal', sinks: [sink] })
 * await encryptFile({ keyPath: 'default.key', messagePath: 'note.txt', logger })
 * console.log(sink.text())
 * ```
 *
 * @packageDocumentation
 */

import { describeError } from '../errors.js'
import type { LogLevel, LogRecord } from '../types.js'

/** Receives every record a logger emits at or above its level. */
export interface LogSink {
  write(record: LogRecord): void
}

export interface Logger {
  readonly name: string
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  /** A logger sharing the same sinks and level, named `<parent>.<name>`. */
  child(name: string): Logger
}

export interface CreateLoggerOptions {
  name: string
  sinks: readonly LogSink[]
  /** Records below this level are dropped. Defaults to `'debug'`. */
  level?: LogLevel | undefined
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

/** Whether `level` is at or above `threshold`. */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

/** `[2026-01-01T00:00:00.000Z][keyseal] INFO: message` */
export function formatRecord(record: LogRecord): string {
  return `[${record.timestamp.toISOString()}][${record.name}] ${record.level.toUpperCase()}: ${record.message}`
}

/**
 * Create a logger fanning records out to `options.sinks`.
 *
 * A sink that throws is detached from this logger and the failure is reported
 * as a `warn` record to the remaining sinks; logging never throws into the
 * caller.
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const threshold = options.level ?? 'debug'
  const sinks = [...options.sinks]

  const deliver = (record: LogRecord): void => {
    for (const sink of [...sinks]) {
      if (!sinks.includes(sink)) {
        continue
      }
      try {
        sink.write(record)
      } catch (e) {
        sinks.splice(sinks.indexOf(sink), 1)
        deliver({
          timestamp: new Date(),
          name: options.name,
          level: 'warn',
          message: `Log sink detached after a write failure: ${describeError(e)}`,
        })
      }
    }
  }

  const emit = (level: LogLevel, message: string): void => {
    if (!isLevelEnabled(level, threshold)) {
      return
    }
    deliver({ timestamp: new Date(), name: options.name, level, message })
  }

  return {
    name: options.name,
    debug: (message) => {
      emit('debug', message)
    },
    info: (message) => {
      emit('info', message)
    },
    warn: (message) => {
      emit('warn', message)
    },
    error: (message) => {
      emit('error', message)
    },
    child: (name) => createLogger({ name: `${options.name}.${name}`, sinks, level: threshold }),
  }
}

/** Logger with no sinks; the default when a caller supplies none. */
export const silentLogger: Logger = createLogger({ name: 'keyseal', sinks: [] })
