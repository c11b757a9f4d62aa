/**
 * Logger that keeps every record for assertions.
 */

import { MemoryLogSink, createLogger } from 'keyseal'
import type { Logger } from 'keyseal'

export interface RecordingLogger {
  logger: Logger
  sink: MemoryLogSink
}

/**
 * Create a debug-level logger backed by a {@link MemoryLogSink}.
 *
 * @public
 */
export function createRecordingLogger(name = 'keyseal'): RecordingLogger {
  const sink = new MemoryLogSink()
  return { logger: createLogger({ name, sinks: [sink], level: 'debug' }), sink }
}
