/**
 * Shared filesystem helpers for keyseal unit tests.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { MemoryLogSink, createLogger } from '../../src/log/index.js'
import type { Logger } from '../../src/log/index.js'

/** Create a fresh temporary directory; remove it with {@link removeTempDir}. */
export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'keyseal-unit-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

/** A debug-level logger whose records land in the returned sink. */
export function makeLogger(): { logger: Logger; sink: MemoryLogSink } {
  const sink = new MemoryLogSink()
  return { logger: createLogger({ name: 'test', sinks: [sink] }), sink }
}
