/**
 * End-to-end file operations: load key, load message, transform, write.
 *
 * Each function runs one operation to completion and reports the first
 * failure it meets. Nothing here exits the process; a fatal error (no key)
 * is returned like any other and the caller decides what to do with it.
 */

import * as path from 'node:path'
import { decryptMessage, encryptMessage } from './cipher/cipher.js'
import type { CipherError, IOError, KeyLoadError } from './errors.js'
import { deriveOutputPath, loadMessage, writeMessage } from './io/message-file.js'
import { DEFAULT_KEY_FILE, generateKey, loadKey } from './keys/manager.js'
import { silentLogger } from './log/logger.js'
import type { Logger } from './log/logger.js'
import { err, ok } from './result.js'
import type { Result } from './result.js'
import type { CipherOperation, KeyMaterial } from './types.js'

export interface FileOperationOptions {
  keyPath: string
  /** The plaintext (encrypt) or ciphertext (decrypt) file. */
  messagePath: string
  /** Directory for the derived output file. Defaults to the working directory. */
  outputDir?: string | undefined
  /** Replace an existing output file. Defaults to `true`. */
  overwrite?: boolean | undefined
  logger?: Logger | undefined
}

export interface FileOperationResult {
  operation: CipherOperation
  /** Absolute key path used for the operation. */
  keyPath: string
  inputPath: string
  outputPath: string
}

export type FileOperationError = KeyLoadError | IOError | CipherError

export interface CreateKeyFileOptions {
  keyPath?: string | undefined
  logger?: Logger | undefined
}

type Transform = (
  key: KeyMaterial,
  text: string,
  logger: Logger,
) => Promise<Result<string, CipherError>>

const TRANSFORMS: Record<CipherOperation, Transform> = {
  encrypt: encryptMessage,
  decrypt: decryptMessage,
}

const FAILURE_NOTICE: Record<CipherOperation, string> = {
  encrypt: 'Encryption failed',
  decrypt: 'Decryption failed',
}

async function runFileOperation(
  operation: CipherOperation,
  options: FileOperationOptions,
): Promise<Result<FileOperationResult, FileOperationError>> {
  const logger = options.logger ?? silentLogger

  const key = await loadKey(options.keyPath, logger)
  if (!key.ok) {
    return key
  }

  const message = await loadMessage(options.messagePath, logger)
  if (!message.ok) {
    return message
  }

  const transformed = await TRANSFORMS[operation](key.value, message.value, logger)
  if (!transformed.ok) {
    logger.info(FAILURE_NOTICE[operation])
    return err(transformed.error)
  }

  const outputPath = deriveOutputPath(options.messagePath, operation, options.outputDir)
  const written = await writeMessage(
    transformed.value,
    outputPath,
    { overwrite: options.overwrite },
    logger,
  )
  if (!written.ok) {
    return written
  }

  return ok({
    operation,
    keyPath: key.value.path,
    inputPath: path.resolve(options.messagePath),
    outputPath: written.value,
  })
}

/** Encrypt `messagePath` into `<name>_C<ext>`. */
export function encryptFile(
  options: FileOperationOptions,
): Promise<Result<FileOperationResult, FileOperationError>> {
  return runFileOperation('encrypt', options)
}

/** Decrypt `messagePath` into `<name>_D<ext>`. */
export function decryptFile(
  options: FileOperationOptions,
): Promise<Result<FileOperationResult, FileOperationError>> {
  return runFileOperation('decrypt', options)
}

/** Generate a new key file, by default `default.key` in the working directory. */
export function createKeyFile(
  options?: CreateKeyFileOptions,
): Promise<Result<KeyMaterial, IOError>> {
  return generateKey(options?.keyPath ?? DEFAULT_KEY_FILE, options?.logger ?? silentLogger)
}
