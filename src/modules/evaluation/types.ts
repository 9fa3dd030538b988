/**
 * Type definitions for the evaluation module.
 */

import type { SpeakerName, TurnNumber } from '../../core/types.js'
import type { Criterion } from './criteria.js'

/** Per-criterion scores; always holds exactly the five criteria */
export type CriteriaScores = Readonly<Record<Criterion, number>>

/**
 * The scored assessment of one argument in one turn.
 *
 * Every score lies in [1.0, 10.0]; strengths and weaknesses are never empty.
 * Instances are frozen when built.
 */
export interface Evaluation {
  readonly speaker: SpeakerName
  readonly turn: TurnNumber
  readonly overallScore: number
  readonly criteriaScores: CriteriaScores
  readonly strengths: readonly string[]
  readonly weaknesses: readonly string[]
  readonly reasoning: string
}

// ---------------------------------------------------------------------------
// Parser result
// ---------------------------------------------------------------------------

export type ParseFailureReason =
  | 'no_json_block'
  | 'invalid_json'
  | 'missing_criteria'
  | 'invalid_criteria'

/** A repair the parser applied to an incomplete but decodable response */
export interface DataQualityWarning {
  field: string
  issue: 'missing' | 'invalid_score' | 'empty'
  /** Value substituted for the missing or invalid one */
  substituted: number | string | readonly string[]
}

export type ParseResult =
  | { status: 'parsed'; evaluation: Evaluation; warnings: DataQualityWarning[] }
  | { status: 'failed'; reason: ParseFailureReason; message: string }

// ---------------------------------------------------------------------------
// Prompt construction
// ---------------------------------------------------------------------------

/** Everything a prompt builder needs to describe one evaluation request */
export interface EvaluationRequest {
  topic: string
  speaker: SpeakerName
  turn: TurnNumber
  argument: string
}

export interface EvaluationPrompt {
  systemPrompt: string
  userPrompt: string
}

/** Builds the prompt sent to the LLM for one evaluation request */
export interface EvaluationPromptBuilder {
  build(request: EvaluationRequest): EvaluationPrompt
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Freeze an evaluation together with its nested arrays and score map */
export function freezeEvaluation(evaluation: Evaluation): Evaluation {
  return Object.freeze({
    ...evaluation,
    criteriaScores: Object.freeze({ ...evaluation.criteriaScores }),
    strengths: Object.freeze([...evaluation.strengths]),
    weaknesses: Object.freeze([...evaluation.weaknesses]),
  })
}
