/**
 * Message encryption and decryption using `jose` with `dir` + `A256GCM`.
 *
 * A ciphertext is a compact JWE: five Base64URL segments joined by `.`.
 * Decryption fails closed on a wrong key, a truncated token or any altered
 * byte; it never returns partially decrypted text.
 */

import { CompactEncrypt, compactDecrypt } from 'jose'
import { CipherError, describeError } from '../errors.js'
import { silentLogger } from '../log/logger.js'
import type { Logger } from '../log/logger.js'
import { err, ok } from '../result.js'
import type { Result } from '../result.js'
import type { KeyMaterial } from '../types.js'

const ALGORITHM = 'dir'
const ENCRYPTION = 'A256GCM'

/**
 * Encrypt `plaintext` with `key`. The returned string is plain ASCII and can
 * be written to a text file as is.
 */
export async function encryptMessage(
  key: KeyMaterial,
  plaintext: string,
  logger: Logger = silentLogger,
): Promise<Result<string, CipherError>> {
  logger.debug('Encrypting message...')
  try {
    const jwe = await new CompactEncrypt(new TextEncoder().encode(plaintext))
      .setProtectedHeader({ alg: ALGORITHM, enc: ENCRYPTION })
      .encrypt(key.bytes)
    return ok(jwe)
  } catch (e) {
    const error = new CipherError(`Encryption failed: ${describeError(e)}`, 'encrypt')
    logger.error(error.message)
    return err(error)
  }
}

/**
 * Decrypt a compact JWE produced by {@link encryptMessage}. Surrounding
 * whitespace (such as a trailing newline) is ignored.
 */
export async function decryptMessage(
  key: KeyMaterial,
  ciphertext: string,
  logger: Logger = silentLogger,
): Promise<Result<string, CipherError>> {
  logger.debug('Decrypting message...')
  try {
    const { plaintext } = await compactDecrypt(ciphertext.trim(), key.bytes, {
      keyManagementAlgorithms: [ALGORITHM],
      contentEncryptionAlgorithms: [ENCRYPTION],
    })
    return ok(new TextDecoder().decode(plaintext))
  } catch (e) {
    const error = new CipherError(`Decryption failed: ${describeError(e)}`, 'decrypt')
    logger.error(error.message)
    return err(error)
  }
}
