/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Ensures that API keys for the LLM and search collaborators never appear in
 * logs, command output or error messages.
 */

import { isPlainObject } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify API key values.
 * Used by the string-scrubbing function.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Groq: gsk_...
  /gsk_[A-Za-z0-9]{20,}/g,
  // Tavily: tvly-...
  /tvly-[A-Za-z0-9_-]{16,}/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Known Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 *
 * @example
 * import pino from 'pino'
 * import { PINO_REDACT_PATHS } from './masking.js'
 * const logger = pino({ redact: PINO_REDACT_PATHS })
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  '*.headers.authorization',
  'env.GROQ_API_KEY',
  'env.OPENAI_API_KEY',
  'env.ANTHROPIC_API_KEY',
  'env.TAVILY_API_KEY',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * This is a best-effort scrub for log messages and error strings; it does
 * NOT guarantee removal of every possible secret format.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

/**
 * Credential field names that should be replaced with `***` in displayed output.
 */
const CREDENTIAL_FIELDS = new Set([
  'api_key',
  'apiKey',
  'api_key_value',
  'token',
  'secret',
  'password',
])

/**
 * Deep-clone a plain-object tree, replacing known credential fields with `***`
 * and scrubbing key-shaped substrings out of every string value.
 */
export function deepMask(value: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(value)) {
    masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : maskValue(v)
  }
  return masked
}

function maskValue(value: unknown): unknown {
  if (typeof value === 'string') return maskSecrets(value)
  if (Array.isArray(value)) return value.map(maskValue)
  if (isPlainObject(value)) return deepMask(value)
  return value
}
