import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { CONFIG_FILE_NAME, defaultConfig, getDefaultConfigDir, loadConfig } from 'keyseal'
import { EXIT_FAILURE, EXIT_OK, reportError } from '../output.js'

export async function configCommand(args: string[]): Promise<number> {
  const { positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: false,
  })

  const subcommand = positionals[0]
  const configDir = getDefaultConfigDir()
  const configPath = path.join(configDir, CONFIG_FILE_NAME)

  switch (subcommand) {
    case 'init': {
      try {
        await fs.mkdir(configDir, { recursive: true, mode: 0o700 })
        await fs.writeFile(configPath, JSON.stringify(defaultConfig(), null, 2) + '\n', {
          encoding: 'utf8',
          mode: 0o600,
          flag: 'wx',
        })
        process.stdout.write(`Config created at ${configPath}\n`)
        return EXIT_OK
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
          process.stderr.write(`Config already exists at ${configPath}\n`)
          return EXIT_FAILURE
        }
        return reportError(err)
      }
    }

    case 'show': {
      try {
        // Print the effective config, defaults included.
        const config = await loadConfig(configDir)
        process.stdout.write(JSON.stringify(config, null, 2) + '\n')
        return EXIT_OK
      } catch (err) {
        return reportError(err)
      }
    }

    default:
      process.stderr.write('Usage: keyseal config <init|show>\n')
      return EXIT_FAILURE
  }
}
