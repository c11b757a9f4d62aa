/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import { KeysealError, isFatal } from 'keyseal'

/** Process exit codes. */
export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_FATAL = 2

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/** Fatal keyseal errors exit with 2; everything else with 1. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof KeysealError && isFatal(err)) {
    return EXIT_FATAL
  }
  return EXIT_FAILURE
}

/** Print `err` on stderr and return the matching exit code. */
export function reportError(err: unknown): number {
  process.stderr.write(`${formatError(err)}\n`)
  return exitCodeFor(err)
}
