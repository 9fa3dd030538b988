/**
 * Shared plumbing for commands that need configuration and collaborators.
 */

import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import type { RostrumConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { RandomSource } from '../../modules/evaluation/placeholder-evaluator.js'
import type { SearchClient } from '../../modules/fact-check/types.js'
import type { LlmClient } from '../../modules/llm/types.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Dependencies injectable into commands
// ---------------------------------------------------------------------------

/**
 * Collaborators a command would otherwise build from configuration.
 * Tests pass fakes here; `undefined` means "use the configured one".
 */
export interface CommandDeps {
  llm?: LlmClient | null
  search?: SearchClient | null
  /** Random source for placeholder evaluations */
  random?: RandomSource
  env?: NodeJS.ProcessEnv
}

export interface ConfigDirOptions {
  projectConfigDir?: string
  globalConfigDir?: string
}

export type LoadConfigResult =
  | { ok: true; config: RostrumConfig }
  | { ok: false; exitCode: number }

/**
 * Load configuration and apply its log level.
 * Errors are reported on stderr and turned into an exit code.
 */
export async function loadCliConfig(
  opts: ConfigDirOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadConfigResult> {
  const system = createConfigSystem({
    env,
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  })

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ConfigIncompatibleFormatError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return { ok: false, exitCode: EXIT_INVALID }
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return { ok: false, exitCode: EXIT_ERROR }
  }

  const config = system.getConfig()
  if (env.LOG_LEVEL === undefined) setLogLevel(config.global.log_level)
  return { ok: true, config }
}

/** Parse a positive integer flag value, or return undefined */
export function parseTurn(raw: string | undefined, fallback = 1): number | undefined {
  if (raw === undefined) return fallback
  if (!/^\d+$/.test(raw.trim())) return undefined
  const n = parseInt(raw, 10)
  return n >= 1 ? n : undefined
}
