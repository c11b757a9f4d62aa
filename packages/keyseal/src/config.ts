/**
 * Configuration loading, validation, and defaults for keyseal.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigError, errnoCode } from './errors.js'
import { DEFAULT_KEY_FILE } from './keys/manager.js'
import { isLogLevel } from './log/logger.js'
import type { KeysealConfig, LogConfig } from './types.js'

export const CONFIG_FILE_NAME = 'config.json'

/**
 * Return the config directory: `$KEYSEAL_CONFIG_DIR` when set, otherwise the
 * platform-appropriate default.
 */
export function getDefaultConfigDir(): string {
  const override = process.env.KEYSEAL_CONFIG_DIR
  if (override !== undefined && override !== '') {
    return override
  }
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'keyseal')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'keyseal')
  }
  return path.join(os.homedir(), '.config', 'keyseal')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): KeysealConfig {
  return {
    version: 1,
    keyFile: DEFAULT_KEY_FILE,
    outputDir: '.',
    overwrite: true,
    log: { file: 'run.log', level: 'debug' },
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function validateLogConfig(value: unknown, fallback: LogConfig): LogConfig {
  if (value === undefined) {
    return fallback
  }
  if (!isObject(value)) {
    throw new ConfigError('Config log must be an object')
  }

  const result: LogConfig = { ...fallback }

  const file = value.file
  if (file === null) {
    result.file = null
  } else if (typeof file === 'string' && file.trim() !== '') {
    result.file = file
  } else if (file !== undefined) {
    throw new ConfigError('Config log.file must be a non-empty string or null')
  }

  if (value.level !== undefined) {
    if (!isLogLevel(value.level)) {
      throw new ConfigError('Config log.level must be one of debug, info, warn, error')
    }
    result.level = value.level
  }

  return result
}

/**
 * Validate an unknown value as a KeysealConfig, throwing on invalid structure.
 * Fields other than `version` are optional and take their default values.
 */
export function validateConfig(config: unknown): KeysealConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new ConfigError('Config version must be 1')
  }

  const defaults = defaultConfig()
  const result: KeysealConfig = { ...defaults }

  if (config.keyFile !== undefined) {
    if (typeof config.keyFile !== 'string' || config.keyFile.trim() === '') {
      throw new ConfigError('Config keyFile must be a non-empty string')
    }
    result.keyFile = config.keyFile
  }

  if (config.outputDir !== undefined) {
    if (typeof config.outputDir !== 'string' || config.outputDir.trim() === '') {
      throw new ConfigError('Config outputDir must be a non-empty string')
    }
    result.outputDir = config.outputDir
  }

  if (config.overwrite !== undefined) {
    if (typeof config.overwrite !== 'boolean') {
      throw new ConfigError('Config overwrite must be a boolean')
    }
    result.overwrite = config.overwrite
  }

  result.log = validateLogConfig(config.log, defaults.log)

  return result
}

/**
 * Load the keyseal config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to {@link getDefaultConfigDir}.
 * @throws ConfigError when the file exists but is unreadable, not JSON, or invalid
 */
export async function loadConfig(configDir?: string): Promise<KeysealConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') {
      return defaultConfig()
    }
    throw new ConfigError(`Failed to read config file at ${configPath}`, configPath)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`, configPath)
  }

  try {
    return validateConfig(parsed)
  } catch (e) {
    if (e instanceof ConfigError) {
      throw new ConfigError(`${e.message} (${configPath})`, configPath)
    }
    throw e
  }
}
