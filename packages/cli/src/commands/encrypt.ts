import { runCipherCommand } from './cipher-command.js'

export function encryptCommand(args: string[]): Promise<number> {
  return runCipherCommand('encrypt', args)
}
