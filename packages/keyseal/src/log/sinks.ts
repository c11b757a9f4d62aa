/**
 * Log sink implementations.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import type { LogLevel, LogRecord } from '../types.js'
import type { LogSink } from './logger.js'
import { formatRecord, isLevelEnabled } from './logger.js'

export interface LogSinkOptions {
  /** Records below this level are not written. Defaults to `'debug'`. */
  minLevel?: LogLevel | undefined
}

/**
 * Appends one formatted line per record to a local log file.
 *
 * @remarks
 * Writes are synchronous so that lines land in the order they were emitted,
 * even when the process exits right after a failure. The parent directory is
 * created on first write.
 */
export class FileLogSink implements LogSink {
  readonly path: string
  readonly #minLevel: LogLevel
  #dirReady = false

  constructor(filePath: string, options?: LogSinkOptions) {
    this.path = path.resolve(filePath)
    this.#minLevel = options?.minLevel ?? 'debug'
  }

  write(record: LogRecord): void {
    if (!isLevelEnabled(record.level, this.#minLevel)) {
      return
    }
    if (!this.#dirReady) {
      fs.mkdirSync(path.dirname(this.path), { recursive: true })
      this.#dirReady = true
    }
    fs.appendFileSync(this.path, `${formatRecord(record)}\n`, 'utf8')
  }
}

/** Anything with a `write(string)` method, such as `process.stderr`. */
export interface TextStream {
  write(chunk: string): unknown
}

/** Writes formatted lines to a text stream. */
export class StreamLogSink implements LogSink {
  readonly #stream: TextStream
  readonly #minLevel: LogLevel

  constructor(stream: TextStream, options?: LogSinkOptions) {
    this.#stream = stream
    this.#minLevel = options?.minLevel ?? 'debug'
  }

  write(record: LogRecord): void {
    if (!isLevelEnabled(record.level, this.#minLevel)) {
      return
    }
    this.#stream.write(`${formatRecord(record)}\n`)
  }
}

/**
 * Keeps every record in memory.
 *
 * The accumulated {@link MemoryLogSink.text | text} is the session transcript
 * a front end can show next to its controls.
 */
export class MemoryLogSink implements LogSink {
  readonly #records: LogRecord[] = []

  write(record: LogRecord): void {
    this.#records.push(record)
  }

  get records(): readonly LogRecord[] {
    return this.#records
  }

  /** Messages only, in emission order. */
  messages(level?: LogLevel): string[] {
    return this.#records
      .filter((record) => level === undefined || record.level === level)
      .map((record) => record.message)
  }

  /** All formatted lines joined with newlines. */
  text(): string {
    return this.#records.map(formatRecord).join('\n')
  }

  clear(): void {
    this.#records.length = 0
  }
}
