/**
 * Evaluation parser: turns a raw LLM response into an Evaluation.
 *
 * Decoding failures (no JSON, undecodable JSON, missing or malformed
 * `criteria`) produce a `failed` ParseResult; the pipeline then falls back to
 * the placeholder evaluator. Incomplete but decodable responses are repaired
 * in place and the repairs are reported as data-quality warnings.
 */

import { createLogger } from '../../utils/logger.js'
import { truncate } from '../../utils/helpers.js'
import type { SpeakerName, TurnNumber } from '../../core/types.js'
import { CRITERIA, type Criterion } from './criteria.js'
import { extractJsonObject } from './json-extractor.js'
import { RawCriterionSchema, RawEvaluationResponseSchema } from './schemas.js'
import { DEFAULT_SCORE, clampScore, parseScore, roundScore } from './score-normalizer.js'
import {
  freezeEvaluation,
  type DataQualityWarning,
  type ParseResult,
} from './types.js'

const logger = createLogger('evaluation-parser')

export const DEFAULT_STRENGTHS: readonly string[] = ['Good argumentation']
export const DEFAULT_WEAKNESSES: readonly string[] = ['Could be improved']
export const DEFAULT_REASONING = 'This is an automated evaluation.'

// ---------------------------------------------------------------------------
// parseEvaluation
// ---------------------------------------------------------------------------

/**
 * Parse a raw model response into an Evaluation for `speaker` at `turn`.
 *
 * Every score is clamped to [1, 10] and rounded to one decimal. Missing or
 * non-numeric criterion scores become 5.0; a missing or non-numeric
 * `overall_score` becomes the mean of the five criterion scores.
 */
export function parseEvaluation(
  rawText: string,
  speaker: SpeakerName,
  turn: TurnNumber
): ParseResult {
  const extracted = extractJsonObject(rawText)
  if (!extracted.ok) {
    return { status: 'failed', reason: extracted.reason, message: extracted.message }
  }

  if (!('criteria' in extracted.value)) {
    return {
      status: 'failed',
      reason: 'missing_criteria',
      message: 'Decoded response has no "criteria" key',
    }
  }

  const validated = RawEvaluationResponseSchema.safeParse(extracted.value)
  if (!validated.success) {
    return {
      status: 'failed',
      reason: 'invalid_criteria',
      message: `Schema validation error: ${validated.error.message}`,
    }
  }

  const response = validated.data
  const warnings: DataQualityWarning[] = []

  // Criterion keys are matched case-insensitively ("Clarity" == "clarity")
  const rawCriteria = new Map<string, unknown>()
  for (const [key, value] of Object.entries(response.criteria)) {
    rawCriteria.set(key.trim().toLowerCase(), value)
  }

  const scoreCriterion = (criterion: Criterion): number => {
    const entry = rawCriteria.get(criterion)
    if (entry === undefined) {
      warnings.push({ field: `criteria.${criterion}`, issue: 'missing', substituted: DEFAULT_SCORE })
      return DEFAULT_SCORE
    }
    const parsed = parseScore(criterionScoreValue(entry))
    if (parsed === null) {
      warnings.push({ field: `criteria.${criterion}`, issue: 'invalid_score', substituted: DEFAULT_SCORE })
      return DEFAULT_SCORE
    }
    return roundScore(clampScore(parsed))
  }

  const criteriaScores: Record<Criterion, number> = {
    clarity: scoreCriterion('clarity'),
    evidence: scoreCriterion('evidence'),
    reasoning: scoreCriterion('reasoning'),
    persuasiveness: scoreCriterion('persuasiveness'),
    relevance: scoreCriterion('relevance'),
  }

  let overallScore: number
  const parsedOverall = parseScore(response.overall_score)
  if (parsedOverall === null) {
    const mean = CRITERIA.reduce((sum, c) => sum + criteriaScores[c], 0) / CRITERIA.length
    overallScore = roundScore(clampScore(mean))
    warnings.push({
      field: 'overall_score',
      issue: response.overall_score === undefined ? 'missing' : 'invalid_score',
      substituted: overallScore,
    })
  } else {
    overallScore = roundScore(clampScore(parsedOverall))
  }

  const strengths = listOrDefault('strengths', response.strengths, DEFAULT_STRENGTHS, warnings)
  const weaknesses = listOrDefault('weaknesses', response.weaknesses, DEFAULT_WEAKNESSES, warnings)

  let reasoning = DEFAULT_REASONING
  if (typeof response.reasoning === 'string' && response.reasoning.trim() !== '') {
    reasoning = response.reasoning.trim()
  } else {
    warnings.push({ field: 'reasoning', issue: 'missing', substituted: DEFAULT_REASONING })
  }

  if (warnings.length > 0) {
    logger.warn(
      { speaker, turn, warnings, preview: truncate(rawText, 200) },
      'Evaluation response was incomplete; repaired with defaults'
    )
  }

  return {
    status: 'parsed',
    evaluation: freezeEvaluation({
      speaker,
      turn,
      overallScore,
      criteriaScores,
      strengths,
      weaknesses,
      reasoning,
    }),
    warnings,
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** The score carried by one criterion entry, or undefined when it has none */
function criterionScoreValue(entry: unknown): unknown {
  const parsed = RawCriterionSchema.safeParse(entry)
  if (!parsed.success) return undefined
  const value = parsed.data
  return typeof value === 'object' ? value.score : value
}

/** Coerce a strengths/weaknesses value into a non-empty list of strings */
function listOrDefault(
  field: string,
  raw: unknown,
  fallback: readonly string[],
  warnings: DataQualityWarning[]
): readonly string[] {
  const items: string[] = []
  if (Array.isArray(raw)) {
    for (const item of raw) {
      if (typeof item === 'string' || typeof item === 'number') {
        const text = String(item).trim()
        if (text !== '') items.push(text)
      }
    }
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    items.push(raw.trim())
  }

  if (items.length > 0) return items

  warnings.push({ field, issue: raw === undefined ? 'missing' : 'empty', substituted: fallback })
  return fallback
}
