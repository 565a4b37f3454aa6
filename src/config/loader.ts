import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { TapConfigSchema, type TapConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

export const ENV_PREFIX = 'FORMS_TAP_'

const ARRAY_OPTIONS = new Set(['extra_retry_statuses'])

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

/**
 * Apply FORMS_TAP_ prefixed environment variable overrides to config.
 *
 * Only keys declared by the schema are taken (FORMS_TAP_LOG_LEVEL belongs to
 * the logger). Array options accept a comma-separated list:
 *   FORMS_TAP_EXTRA_RETRY_STATUSES=429,503 -> extra_retry_statuses = ['429', '503']
 * Values stay strings here; Value.Convert types them against the schema.
 */
function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const known = Object.keys(TapConfigSchema.properties)
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const option = key.slice(ENV_PREFIX.length).toLowerCase()
    if (!known.includes(option)) continue
    config[option] = ARRAY_OPTIONS.has(option)
      ? value.split(',').map((v) => v.trim()).filter((v) => v.length > 0)
      : value
  }
  return config
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/**
 * Validate an already-parsed configuration object.
 *
 * Pipeline: merge defaults -> apply env overrides -> convert env strings
 *           -> validate against TypeBox schema -> check start_date -> freeze
 */
export function resolveConfig(
  userConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): TapConfig {
  const merged = applyEnvOverrides(
    structuredClone({ ...DEFAULT_CONFIG, ...userConfig }),
    env,
  )
  const config = Value.Convert(TapConfigSchema, merged)

  if (!Value.Check(TapConfigSchema, config)) {
    const fields = [...Value.Errors(TapConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  if (config.start_date !== undefined && Number.isNaN(Date.parse(config.start_date))) {
    throw new ConfigError(
      `Invalid start_date "${config.start_date}": expected an ISO-8601 timestamp`,
      [{ path: '/start_date', message: 'expected an ISO-8601 timestamp' }],
    )
  }

  return deepFreeze(config)
}

/**
 * Load, validate, and return a frozen TapConfig.
 *
 * @param configPath - Path to forms-tap.config.json
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): TapConfig {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let userConfig: unknown
  try {
    userConfig = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }

  if (userConfig === null || typeof userConfig !== 'object' || Array.isArray(userConfig)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }

  return resolveConfig({ ...userConfig }, env)
}
