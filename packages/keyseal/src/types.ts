/**
 * Shared types for keyseal.
 */

/** Direction of a cipher operation. */
export type CipherOperation = 'encrypt' | 'decrypt'

/**
 * A symmetric key held in memory for the duration of one operation.
 */
export interface KeyMaterial {
  /** Raw key bytes, exactly as stored in the key file. */
  bytes: Uint8Array
  /** Absolute path the key was read from or written to. */
  path: string
}

/** Severity levels, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** A single log event delivered to every sink. */
export interface LogRecord {
  timestamp: Date
  /** Logger name, e.g. `keyseal` or `keyseal.cipher`. */
  name: string
  level: LogLevel
  message: string
}

/**
 * keyseal configuration, as stored in `config.json`.
 */
export interface KeysealConfig {
  version: 1
  /** Key file used when none is given explicitly. */
  keyFile: string
  /** Directory that receives `_C` / `_D` output files. */
  outputDir: string
  /** Whether an existing output file may be replaced. */
  overwrite: boolean
  log: LogConfig
}

export interface LogConfig {
  /** Append-only log file, or `null` to disable file logging. */
  file: string | null
  /** Lowest level written to the log file. */
  level: LogLevel
}
