/**
 * Cipher barrel export.
 */

export { encryptMessage, decryptMessage } from './cipher.js'
