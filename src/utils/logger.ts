/**
 * Logger utility for rostrum
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Level set through setLogLevel(); takes precedence over the environment default */
let levelOverride: string | undefined

/** Every logger created through createLogger(), so that setLogLevel() reaches them */
const createdLoggers = new Set<pino.Logger>()

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  if (levelOverride !== undefined) return levelOverride
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV set (typical CLI use): default to warn to avoid noise
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // Plain JSON everywhere else
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  let instance: pino.Logger
  if (pretty) {
    // Note: pino transport errors are asynchronous and cannot be caught here.
    // pino-pretty is a devDependency; only use in non-production environments.
    instance = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  } else {
    // stderr, so that JSON command output on stdout stays parseable
    instance = pino(baseOptions, pino.destination(2))
  }

  if (options.level === undefined) {
    createdLoggers.add(instance)
  }
  return instance
}

/**
 * Apply a log level to every logger created without an explicit level,
 * and to those created afterwards.
 *
 * The CLI calls this with `global.log_level` once configuration is loaded.
 */
export function setLogLevel(level: string): void {
  levelOverride = level
  for (const instance of createdLoggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('rostrum')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
