/**
 * Score normalization: coerces arbitrary numeric-like values into [1.0, 10.0].
 */

export const MIN_SCORE = 1.0
export const MAX_SCORE = 10.0

/** Neutral midpoint substituted for invalid input */
export const DEFAULT_SCORE = 5.0

/** A plain decimal numeral: optional sign, digits, optional fraction */
const DECIMAL_NUMERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/

/**
 * Read a raw value as a number, or return null when it is not numeric.
 *
 * Numbers are taken as they are (NaN counts as invalid); strings are trimmed
 * and must be a plain decimal numeral. Everything else is invalid.
 */
export function parseScore(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isNaN(raw) ? null : raw
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim()
    return DECIMAL_NUMERAL.test(trimmed) ? Number.parseFloat(trimmed) : null
  }
  return null
}

/** Clamp a number to [MIN_SCORE, MAX_SCORE] */
export function clampScore(value: number): number {
  return Math.min(Math.max(value, MIN_SCORE), MAX_SCORE)
}

/**
 * Coerce any value into a bounded score. Never throws.
 *
 * @example
 * normalizeScore('7')      // 7
 * normalizeScore('banana') // 5
 * normalizeScore(15)       // 10
 * normalizeScore(-3)       // 1
 */
export function normalizeScore(raw: unknown): number {
  const parsed = parseScore(raw)
  return clampScore(parsed ?? DEFAULT_SCORE)
}

/** Round a score to one decimal place */
export function roundScore(value: number): number {
  return Math.round(value * 10) / 10
}
