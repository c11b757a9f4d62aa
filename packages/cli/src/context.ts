/**
 * Per-command setup shared by every subcommand.
 *
 * @internal
 */

import { loadConfig } from 'keyseal'
import type { KeysealConfig, Logger } from 'keyseal'
import { createCliLogger } from './logging.js'

export interface CommandContext {
  config: KeysealConfig
  logger: Logger
}

/**
 * Load the config and build the command logger.
 *
 * @throws ConfigError when the config file is present but invalid
 */
export async function createCommandContext(): Promise<CommandContext> {
  const config = await loadConfig()
  return { config, logger: createCliLogger(config) }
}
