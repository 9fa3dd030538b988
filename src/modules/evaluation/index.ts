/**
 * evaluation module: argument scoring against the five criteria
 *
 * Public API re-exports for the evaluation module.
 */

// Types
export type {
  Evaluation,
  CriteriaScores,
  ParseResult,
  ParseFailureReason,
  DataQualityWarning,
  EvaluationRequest,
  EvaluationPrompt,
  EvaluationPromptBuilder,
} from './types.js'
export { freezeEvaluation } from './types.js'
export { CRITERIA, CRITERION_DESCRIPTIONS, isCriterion } from './criteria.js'
export type { Criterion } from './criteria.js'

// Building blocks
export {
  normalizeScore,
  parseScore,
  clampScore,
  roundScore,
  DEFAULT_SCORE,
  MIN_SCORE,
  MAX_SCORE,
} from './score-normalizer.js'
export { extractJsonObject } from './json-extractor.js'
export type { JsonExtractionResult } from './json-extractor.js'
export { parseEvaluation } from './evaluation-parser.js'
export {
  PlaceholderEvaluator,
  createPlaceholderEvaluator,
  PLACEHOLDER_MIN_SCORE,
  PLACEHOLDER_MAX_SCORE,
} from './placeholder-evaluator.js'
export type { PlaceholderEvaluatorOptions, RandomSource } from './placeholder-evaluator.js'
export { buildEvaluationPrompt, defaultPromptBuilder, EVALUATOR_SYSTEM_PROMPT } from './evaluation-prompt.js'

// Interface and implementation
export type { EvaluationPipeline } from './evaluation-pipeline.js'
export { EvaluationPipelineImpl, createEvaluationPipeline } from './evaluation-pipeline-impl.js'
export type { EvaluationPipelineOptions } from './evaluation-pipeline-impl.js'
