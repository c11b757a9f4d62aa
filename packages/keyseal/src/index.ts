/**
 * keyseal: symmetric key generation and authenticated encryption of text
 * files.
 *
 * @packageDocumentation
 */

export {
  KeysealError,
  KeyLoadError,
  CipherError,
  IOError,
  ConfigError,
  isFatal,
  describeError,
} from './errors.js'
export type { Severity, IOOperation } from './errors.js'

export { ok, err } from './result.js'
export type { Result, Ok, Err } from './result.js'

export type {
  CipherOperation,
  KeyMaterial,
  KeysealConfig,
  LogConfig,
  LogLevel,
  LogRecord,
} from './types.js'

export {
  createLogger,
  formatRecord,
  isLevelEnabled,
  isLogLevel,
  silentLogger,
  FileLogSink,
  StreamLogSink,
  MemoryLogSink,
} from './log/index.js'
export type {
  Logger,
  LogSink,
  CreateLoggerOptions,
  TextStream,
  LogSinkOptions,
} from './log/index.js'

export { KEY_LENGTH, DEFAULT_KEY_FILE, createKey, generateKey, loadKey } from './keys/index.js'

export { encryptMessage, decryptMessage } from './cipher/index.js'

export { deriveOutputPath, loadMessage, writeMessage } from './io/index.js'
export type { WriteMessageOptions } from './io/index.js'

export { encryptFile, decryptFile, createKeyFile } from './operations.js'
export type {
  FileOperationOptions,
  FileOperationResult,
  FileOperationError,
  CreateKeyFileOptions,
} from './operations.js'

export {
  CONFIG_FILE_NAME,
  defaultConfig,
  getDefaultConfigDir,
  loadConfig,
  validateConfig,
} from './config.js'
