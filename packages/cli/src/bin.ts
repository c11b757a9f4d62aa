#!/usr/bin/env node
/**
 * CLI entry point for keyseal.
 *
 * Each subcommand is lazy-loaded via dynamic import() so only the requested
 * command's module is loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 *
 * @internal
 */

import { parseArgs } from 'node:util'

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0]
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: keyseal <command> [options]\n\n' +
      'Commands:\n' +
      '  keygen    Generate a new key file (--out <path>)\n' +
      '  encrypt   Encrypt a text file into <name>_C<ext>\n' +
      '  decrypt   Decrypt a text file into <name>_D<ext>\n' +
      '  config    Manage configuration (init, show)\n\n' +
      'encrypt/decrypt options:\n' +
      '  -k, --key <path>       Key file (default: config keyFile)\n' +
      '  -o, --out-dir <dir>    Output directory (default: config outputDir)\n' +
      '  -n, --no-clobber       Fail instead of overwriting an existing output\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'keygen': {
      const { keygenCommand } = await import('./commands/keygen.js')
      return keygenCommand(commandArgs)
    }
    case 'encrypt': {
      const { encryptCommand } = await import('./commands/encrypt.js')
      return encryptCommand(commandArgs)
    }
    case 'decrypt': {
      const { decryptCommand } = await import('./commands/decrypt.js')
      return decryptCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
