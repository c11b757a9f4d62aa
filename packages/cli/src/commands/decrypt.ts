import { runCipherCommand } from './cipher-command.js'

export function decryptCommand(args: string[]): Promise<number> {
  return runCipherCommand('decrypt', args)
}
