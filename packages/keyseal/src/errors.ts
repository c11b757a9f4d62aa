/**
 * Error hierarchy for keyseal.
 *
 * Every error carries a severity. A fatal error means no further operation is
 * meaningful (there is no key, or the configuration cannot be read); callers
 * decide whether that ends the process.
 *
 * @packageDocumentation
 */

import type { CipherOperation } from './types.js'

/** How the caller should treat a failure. */
export type Severity = 'fatal' | 'recoverable'

/** Base error for all keyseal errors. */
export class KeysealError extends Error {
  readonly severity: Severity

  constructor(message: string, severity: Severity) {
    super(message)
    this.name = 'KeysealError'
    this.severity = severity
  }
}

/**
 * Thrown (or returned) when a key file cannot be read. Without a key no
 * encrypt or decrypt operation can run, so this is always fatal.
 */
export class KeyLoadError extends KeysealError {
  /** The absolute path of the key file. */
  readonly path: string

  constructor(message: string, keyPath: string) {
    super(message, 'fatal')
    this.name = 'KeyLoadError'
    this.path = keyPath
  }
}

/**
 * The cipher rejected the input: authentication failed, the token is
 * malformed or truncated, or the key is not usable with the scheme.
 */
export class CipherError extends KeysealError {
  readonly operation: CipherOperation

  constructor(message: string, operation: CipherOperation) {
    super(message, 'recoverable')
    this.name = 'CipherError'
    this.operation = operation
  }
}

/** Kind of file access that failed. */
export type IOOperation = 'read' | 'write'

/**
 * A message or key file could not be read or written.
 */
export class IOError extends KeysealError {
  /** The absolute path of the file that caused the error. */
  readonly path: string

  readonly operation: IOOperation

  /**
   * The errno code reported by the OS (e.g. `'ENOENT'`, `'EACCES'`,
   * `'EEXIST'`), when there was one.
   */
  readonly code: string | undefined

  constructor(message: string, filePath: string, operation: IOOperation, code?: string) {
    super(message, 'recoverable')
    this.name = 'IOError'
    this.path = filePath
    this.operation = operation
    this.code = code
  }
}

/**
 * The config file exists but cannot be parsed or does not match the
 * expected structure.
 */
export class ConfigError extends KeysealError {
  /** Path of the offending config file, when the error came from disk. */
  readonly path: string | undefined

  constructor(message: string, configPath?: string) {
    super(message, 'fatal')
    this.name = 'ConfigError'
    this.path = configPath
  }
}

/** Whether the error should stop the caller from doing anything else. */
export function isFatal(error: KeysealError): boolean {
  return error.severity === 'fatal'
}

/** Render an unknown thrown value as a message string. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Extract the errno code from a Node.js system error, if present. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}
