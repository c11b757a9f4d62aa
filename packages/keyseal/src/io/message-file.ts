/**
 * Whole-file text I/O for messages and output naming.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { IOError, describeError, errnoCode } from '../errors.js'
import { silentLogger } from '../log/logger.js'
import type { Logger } from '../log/logger.js'
import { err, ok } from '../result.js'
import type { Result } from '../result.js'
import type { CipherOperation } from '../types.js'

const OUTPUT_SUFFIX: Record<CipherOperation, string> = {
  encrypt: '_C',
  decrypt: '_D',
}

// Rejects malformed input instead of substituting U+FFFD; keeps a leading BOM.
const UTF8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

export interface WriteMessageOptions {
  /**
   * Replace an existing file at the target path. When `false`, an existing
   * target fails with an `IOError` whose code is `EEXIST`. Defaults to `true`.
   */
  overwrite?: boolean | undefined
}

/**
 * Output path for an operation on `inputPath`: `name.ext` becomes
 * `name_C.ext` (encrypt) or `name_D.ext` (decrypt), placed in `outputDir`.
 *
 * Only the last extension is kept apart (`a.tar.gz` → `a.tar_C.gz`), and
 * already-suffixed names are not special-cased (`note_C.txt` → `note_C_D.txt`).
 * A trailing dot is part of the stem (`file.` → `file._C`).
 *
 * @param outputDir - Defaults to the current working directory.
 */
export function deriveOutputPath(
  inputPath: string,
  operation: CipherOperation,
  outputDir = '.',
): string {
  const parsed = path.parse(inputPath)
  const trailingDot = parsed.ext === '.'
  const stem = trailingDot ? parsed.base : parsed.name
  const ext = trailingDot ? '' : parsed.ext
  return path.resolve(outputDir, `${stem}${OUTPUT_SUFFIX[operation]}${ext}`)
}

/**
 * Read a whole file as UTF-8 text.
 *
 * Bytes that are not valid UTF-8 fail the read rather than being replaced,
 * so a decrypted copy is always byte-identical to the encrypted source.
 */
export async function loadMessage(
  messagePath: string,
  logger: Logger = silentLogger,
): Promise<Result<string, IOError>> {
  const resolved = path.resolve(messagePath)
  logger.debug(`Loading message from ${resolved}`)
  let bytes: Buffer
  try {
    bytes = await fs.readFile(resolved)
  } catch (e) {
    const error = new IOError(
      `Failed to read message from ${resolved}: ${describeError(e)}`,
      resolved,
      'read',
      errnoCode(e),
    )
    logger.error(error.message)
    return err(error)
  }

  try {
    return ok(UTF8.decode(bytes))
  } catch {
    const error = new IOError(`Message file ${resolved} is not valid UTF-8 text`, resolved, 'read')
    logger.error(error.message)
    return err(error)
  }
}

/** Write `text` as the entire content of `messagePath`. */
export async function writeMessage(
  text: string,
  messagePath: string,
  options?: WriteMessageOptions,
  logger: Logger = silentLogger,
): Promise<Result<string, IOError>> {
  const resolved = path.resolve(messagePath)
  const overwrite = options?.overwrite ?? true
  logger.debug(`Writing message on ${resolved}`)
  try {
    await fs.writeFile(resolved, text, { encoding: 'utf8', flag: overwrite ? 'w' : 'wx' })
    return ok(resolved)
  } catch (e) {
    const code = errnoCode(e)
    const message =
      code === 'EEXIST'
        ? `Refusing to overwrite existing file ${resolved}`
        : `Failed to write message on ${resolved}: ${describeError(e)}`
    const error = new IOError(message, resolved, 'write', code)
    logger.error(error.message)
    return err(error)
  }
}
