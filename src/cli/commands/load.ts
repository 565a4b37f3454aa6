import { loadConfig, ConfigError } from '../../config/index.js'
import type { TapConfig } from '../../types/config.js'
import { output } from '../output.js'

/**
 * Load configuration for a command, reporting a ConfigError and exiting
 * with status 1. Returns undefined when the process was told to exit.
 */
export function loadConfigOrExit(configPath: string): TapConfig | undefined {
  try {
    return loadConfig(configPath)
  } catch (err) {
    if (err instanceof ConfigError) {
      output.error(err.message)
      process.exit(1)
      return undefined
    }
    throw err
  }
}
