/**
 * Shared implementation of `keyseal encrypt` and `keyseal decrypt`.
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import { decryptFile, encryptFile } from 'keyseal'
import type { CipherOperation } from 'keyseal'
import { createCommandContext } from '../context.js'
import { EXIT_FAILURE, EXIT_OK, bold, reportError } from '../output.js'

const RUNNERS = {
  encrypt: encryptFile,
  decrypt: decryptFile,
} satisfies Record<CipherOperation, typeof encryptFile>

const DONE_LABEL: Record<CipherOperation, string> = {
  encrypt: 'Encrypted',
  decrypt: 'Decrypted',
}

export async function runCipherCommand(operation: CipherOperation, args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      key: { type: 'string', short: 'k' },
      'out-dir': { type: 'string', short: 'o' },
      'no-clobber': { type: 'boolean', short: 'n' },
    },
    strict: true,
  })

  const messagePath = positionals[0]
  if (messagePath === undefined || positionals.length > 1) {
    process.stderr.write('Error: exactly one message file is required\n')
    process.stderr.write(
      `Usage: keyseal ${operation} <file> [--key <path>] [--out-dir <dir>] [--no-clobber]\n`,
    )
    return EXIT_FAILURE
  }

  try {
    const { config, logger } = await createCommandContext()
    const keyPath = values.key ?? config.keyFile
    logger.info(`Selected key file: ${keyPath}`)
    logger.info(`Selected message file: ${messagePath}`)

    const result = await RUNNERS[operation]({
      keyPath,
      messagePath,
      outputDir: values['out-dir'] ?? config.outputDir,
      overwrite: values['no-clobber'] === true ? false : config.overwrite,
      logger,
    })
    if (!result.ok) {
      return reportError(result.error)
    }

    process.stdout.write(`${DONE_LABEL[operation]} message written to ${bold(result.value.outputPath)}\n`)
    return EXIT_OK
  } catch (err) {
    return reportError(err)
  }
}
