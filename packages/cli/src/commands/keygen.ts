import { parseArgs } from 'node:util'
import { generateKey } from 'keyseal'
import { createCommandContext } from '../context.js'
import { EXIT_OK, bold, reportError } from '../output.js'

export async function keygenCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      out: { type: 'string', short: 'o' },
    },
    strict: true,
  })

  try {
    const { config, logger } = await createCommandContext()
    const result = await generateKey(values.out ?? config.keyFile, logger)
    if (!result.ok) {
      return reportError(result.error)
    }
    process.stdout.write(`Key written to ${bold(result.value.path)}\n`)
    return EXIT_OK
  } catch (err) {
    return reportError(err)
  }
}
