/**
 * CLI output formatting utilities
 *
 * Provides human-readable rendering for evaluations and rankings, and the
 * JSON envelope shared by every command.
 */

import { CRITERIA } from '../../modules/evaluation/criteria.js'
import type { Evaluation } from '../../modules/evaluation/types.js'
import type { RankingEntry } from '../../modules/score-ledger/score-ledger.js'

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by header name)
 * @param keys    - Object keys to read from each row (in column order)
 * @returns Formatted string ready for console output
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  // Compute column widths as max of header and data lengths
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ')
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

/** Render a score with exactly one decimal */
export function formatScore(score: number): string {
  return score.toFixed(1)
}

/**
 * Format rankings as a table with a 1-based rank column.
 */
export function formatRankingsTable(rankings: RankingEntry[]): string {
  const headers = ['Rank', 'Speaker', 'Score', 'Arguments']
  const keys = ['rank', 'name', 'total', 'count']
  const rows: Record<string, string>[] = rankings.map((r, i) => ({
    rank: String(i + 1),
    name: r.name,
    total: formatScore(r.total),
    count: String(r.evaluationCount),
  }))
  return formatTable(headers, rows, keys)
}

/**
 * Format one evaluation as plain text.
 */
export function formatEvaluation(evaluation: Evaluation): string {
  const lines: string[] = [
    `${evaluation.speaker} (turn ${String(evaluation.turn)}): ${formatScore(evaluation.overallScore)}/10`,
    '',
  ]
  const width = Math.max(...CRITERIA.map((c) => c.length))
  for (const criterion of CRITERIA) {
    lines.push(`  ${criterion.padEnd(width)}  ${formatScore(evaluation.criteriaScores[criterion])}`)
  }
  lines.push('', 'Strengths:')
  for (const s of evaluation.strengths) lines.push(`  + ${s}`)
  lines.push('Weaknesses:')
  for (const w of evaluation.weaknesses) lines.push(`  - ${w}`)
  lines.push('', evaluation.reasoning)
  return lines.join('\n')
}

/**
 * CLIJsonOutput wrapper type for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** rostrum version string */
  version: string
  /** The CLI command that was executed */
  command: string
  /** The actual data payload */
  data: T
}

/**
 * Build a CLIJsonOutput wrapper around data.
 */
export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}
