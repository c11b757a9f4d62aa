/**
 * File I/O barrel export.
 */

export { deriveOutputPath, loadMessage, writeMessage } from './message-file.js'
export type { WriteMessageOptions } from './message-file.js'
