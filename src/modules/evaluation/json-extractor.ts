/**
 * JSON extraction for LLM evaluation output.
 *
 * Evaluating models are asked to answer with a single JSON object, but often
 * wrap it in prose or code fences. This module locates and decodes that
 * object regardless of the surrounding text.
 *
 * Extraction strategy:
 * 1. Fenced blocks (```json...``` or ```...```), those containing an anchor
 *    key first, then the LAST one first
 * 2. Balanced top-level `{...}` spans, those containing an anchor key first,
 *    then the longest
 * 3. The slice from the first `{` to the last `}`
 * The first candidate that decodes to a plain object wins.
 */

import { isPlainObject } from '../../utils/helpers.js'

/** Keys whose presence marks a span as the evaluation payload */
const DEFAULT_ANCHOR_KEYS = ['"criteria"', '"overall_score"']

export type JsonExtractionResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: 'no_json_block' | 'invalid_json'; message: string }

// ---------------------------------------------------------------------------
// extractJsonObject
// ---------------------------------------------------------------------------

/**
 * Locate and decode the JSON object embedded in `output`.
 *
 * @param output     - Raw text returned by the model
 * @param anchorKeys - Quoted keys that identify the wanted object
 */
export function extractJsonObject(
  output: string,
  anchorKeys: readonly string[] = DEFAULT_ANCHOR_KEYS
): JsonExtractionResult {
  if (!output || output.trim() === '') {
    return { ok: false, reason: 'no_json_block', message: 'Output is empty' }
  }

  const candidates = collectCandidates(output, anchorKeys)
  if (candidates.length === 0) {
    return { ok: false, reason: 'no_json_block', message: 'No JSON object found in output' }
  }

  let lastError = ''
  for (const candidate of candidates) {
    try {
      const value: unknown = JSON.parse(candidate)
      if (isPlainObject(value)) {
        return { ok: true, value }
      }
      lastError = 'Decoded JSON is not an object'
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err)
    }
  }

  return { ok: false, reason: 'invalid_json', message: `JSON parse error: ${lastError}` }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function collectCandidates(output: string, anchorKeys: readonly string[]): string[] {
  const candidates: string[] = []
  const push = (text: string): void => {
    const trimmed = text.trim()
    if (trimmed.startsWith('{') && !candidates.includes(trimmed)) {
      candidates.push(trimmed)
    }
  }

  const hasAnchor = (span: string): boolean => anchorKeys.some((key) => span.includes(key))

  // Stable sort: among anchored (or unanchored) fences, the last one still comes first
  const blocks = extractFencedBlocks(output)
    .reverse()
    .sort((a, b) => Number(hasAnchor(b)) - Number(hasAnchor(a)))
  for (const block of blocks) {
    push(block)
  }

  const spans = findBalancedObjectSpans(output).sort((a, b) => {
    const anchorOrder = Number(hasAnchor(b)) - Number(hasAnchor(a))
    return anchorOrder !== 0 ? anchorOrder : b.length - a.length
  })
  for (const span of spans) {
    push(span)
  }

  const first = output.indexOf('{')
  const last = output.lastIndexOf('}')
  if (first !== -1 && last > first) {
    push(output.slice(first, last + 1))
  }

  return candidates
}

/**
 * Return the contents of every fenced block (```json ... ``` or ``` ... ```).
 */
function extractFencedBlocks(output: string): string[] {
  const fencePattern = /```(?:json|JSON)?[ \t]*\r?\n([\s\S]*?)```/g
  const blocks: string[] = []
  let match: RegExpExecArray | null

  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.trim() !== '') {
      blocks.push(content)
    }
  }

  return blocks
}

/**
 * Find every top-level `{...}` span whose braces balance, ignoring braces
 * that appear inside JSON string literals.
 */
function findBalancedObjectSpans(output: string): string[] {
  const spans: string[] = []
  let depth = 0
  let start = -1
  let inString = false
  let escaped = false

  for (let i = 0; i < output.length; i++) {
    const ch = output[i]

    if (inString) {
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }

    if (ch === '"' && depth > 0) {
      inString = true
    } else if (ch === '{') {
      if (depth === 0) start = i
      depth++
    } else if (ch === '}' && depth > 0) {
      depth--
      if (depth === 0 && start !== -1) {
        spans.push(output.slice(start, i + 1))
        start = -1
      }
    }
  }

  return spans
}
