/**
 * General utility helpers for rostrum
 */

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/**
 * Truncate text to a maximum length, appending an ellipsis when cut.
 * @param text - Text to truncate
 * @param maxLength - Maximum number of characters kept before the ellipsis
 */
export function truncate(text: string, maxLength: number, ellipsis = '...'): string {
  return text.length > maxLength ? text.slice(0, maxLength) + ellipsis : text
}

/**
 * Return a short message for any thrown value.
 * @param err - Caught value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
