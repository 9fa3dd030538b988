/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.rostrum/config.yaml)
 *     → project config      (./.rostrum/config.yaml)
 *     → environment vars    (ROSTRUM_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { errorMessage, isPlainObject } from '../../utils/helpers.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import {
  RostrumConfigSchema,
  PartialRostrumConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type RostrumConfig,
  type PartialRostrumConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/** Merge `override` into a copy of `base`; plain objects merge, everything else replaces */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of ROSTRUM_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
const ENV_VAR_MAP: Record<string, string> = {
  ROSTRUM_LOG_LEVEL: 'global.log_level',
  ROSTRUM_LLM_PROVIDER: 'llm.provider',
  ROSTRUM_LLM_MODEL: 'llm.model',
  ROSTRUM_LLM_BASE_URL: 'llm.base_url',
  ROSTRUM_FACT_CHECK_ENABLED: 'fact_check.enabled',
}

/** Coerce an environment string to the scalar it spells */
function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialRostrumConfig {
  let overrides: Record<string, unknown> = {}

  // Each variable is validated on its own; a bad one does not drop the rest
  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    const value = coerceEnvValue(rawValue)
    const parsed = PartialRostrumConfigSchema.safeParse(setByPath({}, configPath, value))
    if (!parsed.success) {
      logger.warn({ envKey, errors: parsed.error.issues }, 'Invalid environment variable override ignored')
      continue
    }
    overrides = setByPath(overrides, configPath, value)
  }

  const parsed = PartialRostrumConfigSchema.safeParse(overrides)
  return parsed.success ? parsed.data : {}
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
function setByPath(obj: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return { ...obj }
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: RostrumConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialRostrumConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.rostrum')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.rostrum')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Apply global user config if present
    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    // 3. Apply project config if present
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    // 4. Apply environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 5. Apply CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 6. Validate the merged config
    const result = RostrumConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): RostrumConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    // Optional leaves (llm.cli_path) are absent from the merged config but still settable
    if (existing === undefined && !this._isSchemaLeaf(key)) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }

    // We don't allow replacing whole sections
    if (isPlainObject(existing)) {
      throw new ConfigError(`Cannot set object key "${key}"; use a more specific dot-notation path`, {
        key,
      })
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw: Record<string, unknown> = (await this._loadYamlFile(projectConfigPath)) ?? {}

    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialRostrumConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    // Write back and reload
    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')
    await this.load()
  }

  getMasked(): Record<string, unknown> {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** Whether `key` names a field of one of the config sections */
  private _isSchemaLeaf(key: string): boolean {
    const [section, field, ...rest] = key.split('.')
    if (section === undefined || field === undefined || rest.length > 0) return false
    const shape = RostrumConfigSchema.shape
    switch (section) {
      case 'global':
        return field in shape.global.shape
      case 'llm':
        return field in shape.llm.shape
      case 'fact_check':
        return field in shape.fact_check.shape
      default:
        return false
    }
  }

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialRostrumConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (
        version !== undefined &&
        !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(String(version))
      ) {
        throw new ConfigIncompatibleFormatError(
          `Unsupported config_format_version "${String(version)}" in ${filePath}. ` +
            `Supported versions: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version }
        )
      }
    }

    const result = PartialRostrumConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }

    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
