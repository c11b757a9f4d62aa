/**
 * Key management barrel export.
 */

export { KEY_LENGTH, DEFAULT_KEY_FILE, createKey, generateKey, loadKey } from './manager.js'
