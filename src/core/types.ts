/**
 * Core types for rostrum
 * Shared type definitions used across all modules
 */

/** Name identifying a debater; also the key of its ledger record */
export type SpeakerName = string

/** 1-based turn number within a debate */
export type TurnNumber = number

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** How an evaluation was produced */
export type EvaluationSource = 'llm' | 'placeholder'

/** Why the pipeline fell back to the placeholder evaluator */
export type FallbackReason =
  | 'llm_unavailable'
  | 'llm_failed'
  | 'empty_response'
  | 'parse_failed'
  | 'invalid_score'
