/**
 * `rostrum config` command group
 *
 * Subcommands:
 *   - `rostrum config show`             : display merged config (credentials masked)
 *   - `rostrum config get <key>`        : print one value by dot-notation key
 *   - `rostrum config set <key> <value>`: update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { deepMask, maskSecrets } from '../utils/masking.js'
import { EXIT_ERROR, EXIT_INVALID, EXIT_SUCCESS, type ConfigDirOptions } from '../utils/cli-context.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = EXIT_SUCCESS
export const CONFIG_EXIT_ERROR = EXIT_ERROR
export const CONFIG_EXIT_INVALID = EXIT_INVALID

// ---------------------------------------------------------------------------
// Coerce string value to appropriate JS type
// ---------------------------------------------------------------------------

export function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

type LoadedSystem = { ok: true; system: ConfigSystem } | { ok: false; exitCode: number }

async function loadSystem(opts: ConfigDirOptions): Promise<LoadedSystem> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  })

  try {
    await system.load()
    return { ok: true, system }
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ConfigIncompatibleFormatError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return { ok: false, exitCode: CONFIG_EXIT_INVALID }
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return { ok: false, exitCode: CONFIG_EXIT_ERROR }
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigDirOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const loaded = await loadSystem(opts)
  if (!loaded.ok) return loaded.exitCode

  const masked = loaded.system.getMasked()

  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# rostrum configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigDirOptions = {}): Promise<number> {
  const loaded = await loadSystem(opts)
  if (!loaded.ok) return loaded.exitCode

  const value = loaded.system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: unknown or unset config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }

  if (typeof value === 'object' && value !== null) {
    process.stdout.write(yaml.dump(deepMask({ [key]: value })))
  } else {
    process.stdout.write(maskSecrets(String(value)) + '\n')
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ConfigDirOptions = {}
): Promise<number> {
  if (!key || key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const value = coerceValue(rawValue)

  const loaded = await loadSystem(opts)
  if (!loaded.ok) return loaded.exitCode

  try {
    await loaded.system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    process.stderr.write(`  Error updating configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, _version: string): void {
  const configCmd = program
    .command('config')
    .description('Inspect and update rostrum configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .rostrum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .rostrum/ directory')
    .action(
      async (opts: { format: string; projectConfigDir?: string; globalConfigDir?: string }) => {
        if (opts.format !== 'yaml' && opts.format !== 'json') {
          process.stderr.write(`  Error: unknown format "${opts.format}"\n`)
          process.exitCode = CONFIG_EXIT_INVALID
          return
        }
        process.exitCode = await runConfigShow({
          format: opts.format,
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
      }
    )

  configCmd
    .command('get <key>')
    .description('Print one configuration value (e.g. llm.model)')
    .option('--project-config-dir <dir>', 'Path to project .rostrum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .rostrum/ directory')
    .action(async (key: string, opts: { projectConfigDir?: string; globalConfigDir?: string }) => {
      process.exitCode = await runConfigGet(key, {
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. fact_check.enabled true)')
    .option('--project-config-dir <dir>', 'Path to project .rostrum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .rostrum/ directory')
    .action(
      async (
        key: string,
        value: string,
        opts: { projectConfigDir?: string; globalConfigDir?: string }
      ) => {
        process.exitCode = await runConfigSet(key, value, {
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
      }
    )
}
