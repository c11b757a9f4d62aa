/**
 * Logger wiring for CLI commands.
 *
 * @internal
 */

import { FileLogSink, StreamLogSink, createLogger } from 'keyseal'
import type { KeysealConfig, Logger, LogSink } from 'keyseal'

/**
 * Build the logger for one command: the configured log file receives
 * everything at or above `config.log.level`, stderr shows `info` and above.
 */
export function createCliLogger(config: KeysealConfig): Logger {
  const sinks: LogSink[] = [new StreamLogSink(process.stderr, { minLevel: 'info' })]
  if (config.log.file !== null) {
    sinks.push(new FileLogSink(config.log.file, { minLevel: config.log.level }))
  }
  return createLogger({ name: 'keyseal', sinks })
}
