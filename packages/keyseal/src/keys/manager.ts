/**
 * Key generation and loading.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { IOError, KeyLoadError, describeError, errnoCode } from '../errors.js'
import { silentLogger } from '../log/logger.js'
import type { Logger } from '../log/logger.js'
import { err, ok } from '../result.js'
import type { Result } from '../result.js'
import type { KeyMaterial } from '../types.js'

/** Key length required by A256GCM, in bytes. */
export const KEY_LENGTH = 32

/** Key file written when no path is given. */
export const DEFAULT_KEY_FILE = 'default.key'

/** Fresh random key bytes. */
export function createKey(): Uint8Array {
  return new Uint8Array(crypto.randomBytes(KEY_LENGTH))
}

/**
 * Generate a key and write its raw bytes to `keyPath`, replacing any existing
 * file.
 *
 * A write failure is logged and returned as an {@link IOError}; it is never
 * thrown.
 */
export async function generateKey(
  keyPath: string = DEFAULT_KEY_FILE,
  logger: Logger = silentLogger,
): Promise<Result<KeyMaterial, IOError>> {
  const resolved = path.resolve(keyPath)
  logger.debug('Generating the key...')
  const bytes = createKey()
  try {
    await fs.writeFile(resolved, bytes, { mode: 0o600 })
  } catch (e) {
    const error = new IOError(
      `Failed to write key file ${resolved}: ${describeError(e)}`,
      resolved,
      'write',
      errnoCode(e),
    )
    logger.error(error.message)
    return err(error)
  }
  logger.debug(`Key written to ${resolved}`)
  return ok({ bytes, path: resolved })
}

/**
 * Read raw key bytes from `keyPath`.
 *
 * @remarks
 * The bytes are not checked against {@link KEY_LENGTH}; a key the scheme
 * cannot use is reported by the cipher as a `CipherError`.
 *
 * A missing or unreadable file yields a fatal {@link KeyLoadError}.
 */
export async function loadKey(
  keyPath: string,
  logger: Logger = silentLogger,
): Promise<Result<KeyMaterial, KeyLoadError>> {
  const resolved = path.resolve(keyPath)
  logger.debug(`Loading key from ${resolved}`)
  try {
    const data = await fs.readFile(resolved)
    return ok({ bytes: new Uint8Array(data), path: resolved })
  } catch (e) {
    const error = new KeyLoadError(`Failed to load key from ${resolved}: ${describeError(e)}`, resolved)
    logger.error(error.message)
    return err(error)
  }
}
