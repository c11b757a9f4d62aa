/**
 * @keyseal/test-helpers: test utilities for keyseal consumers.
 *
 * @packageDocumentation
 */

export { TempWorkspace } from './temp-workspace.js'
export { createRecordingLogger } from './recording-logger.js'
export type { RecordingLogger } from './recording-logger.js'
