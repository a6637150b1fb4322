import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import type { TSchema } from '@sinclair/typebox'
import { DatabaseError } from '../errors.js'
import {
  ConnectionConfigSchema,
  ConnectionOptionsSchema,
  FacadeConfigSchema,
  type ConnectionOptions,
  type FacadeConfig,
} from '../types/config.js'
import { DEFAULT_CONFIG, DEFAULT_CONNECTION_OPTIONS } from './defaults.js'

const ENV_PREFIX = 'SQLITE_FACADE_'

/** Property names the schemas know, used to restore casing of env keys. */
const KNOWN_KEYS = [
  ...Object.keys(FacadeConfigSchema.properties),
  ...Object.keys(ConnectionConfigSchema.properties),
]

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends DatabaseError {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super('CONFIG_INVALID', message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Coerce string values to appropriate types.
 * Environment variables are always strings.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Resolve a lower-cased env key to the casing used by the object or the
 * schema. Returns the input key if nothing matches.
 */
function resolveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of [...Object.keys(obj), ...KNOWN_KEYS]) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj
  for (const segment of path.slice(0, -1)) {
    const key = resolveKey(current, segment)
    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }
  current[resolveKey(current, path[path.length - 1])] = value
}

/**
 * Apply SQLITE_FACADE_ prefixed environment variable overrides.
 * Double underscores (__) indicate nested paths:
 *   SQLITE_FACADE_DATABASE__READONLY=true -> config.database.readonly = true
 */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

function invalid(schema: TSchema, value: unknown, heading: string): ConfigError {
  const fields = [...Value.Errors(schema, value)].map((e) => ({
    path: e.path,
    message: e.message,
  }))
  const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
  return new ConfigError(`${heading}:\n${fieldMessages}`, fields)
}

/**
 * Merge caller-supplied connection options over the defaults and validate.
 * Undefined entries fall back to the default.
 *
 * @throws ConfigError with field-level details on validation failure
 */
export function resolveConnectionOptions(options: Partial<ConnectionOptions> = {}): ConnectionOptions {
  const candidate: Record<string, unknown> = { ...DEFAULT_CONNECTION_OPTIONS }
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) candidate[key] = value
  }
  if (!Value.Check(ConnectionOptionsSchema, candidate)) {
    throw invalid(ConnectionOptionsSchema, candidate, 'Connection options invalid')
  }
  return candidate
}

/**
 * Load, validate, and return a frozen configuration.
 *
 * Pipeline: read file -> parse JSON -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to the JSON configuration file
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string): FacadeConfig {
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
  if (!isRecord(userConfig)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }

  // Round-trip through JSON so the merged result shares nothing with DEFAULT_CONFIG
  const defaults: unknown = JSON.parse(JSON.stringify(DEFAULT_CONFIG))
  const config = applyEnvOverrides(deepMerge(isRecord(defaults) ? defaults : {}, userConfig))

  if (!Value.Check(FacadeConfigSchema, config)) {
    throw invalid(FacadeConfigSchema, config, 'Configuration invalid')
  }

  return deepFreeze(config)
}
