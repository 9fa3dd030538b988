/**
 * DebateEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "evaluation:completed")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { EvaluationSource, FallbackReason, SpeakerName, TurnNumber } from './types.js'

/**
 * Complete typed map of all events emitted on a debate session's event bus.
 * Use `keyof DebateEvents` to constrain event keys.
 */
export interface DebateEvents {
  // -------------------------------------------------------------------------
  // Evaluation pipeline events
  // -------------------------------------------------------------------------

  /** An argument was evaluated (by the LLM or by the placeholder evaluator) */
  'evaluation:completed': {
    speaker: SpeakerName
    turn: TurnNumber
    overallScore: number
    source: EvaluationSource
  }

  /** The pipeline could not use the LLM result and fell back to a placeholder */
  'evaluation:fallback': {
    speaker: SpeakerName
    turn: TurnNumber
    reason: FallbackReason
    detail?: string
  }

  // -------------------------------------------------------------------------
  // Ledger events
  // -------------------------------------------------------------------------

  /** An evaluation was appended to a speaker's record */
  'ledger:recorded': { speaker: SpeakerName; total: number; evaluationCount: number }

  /** record() was called for a speaker that was never registered */
  'ledger:unknown-speaker': { speaker: SpeakerName; turn: TurnNumber }

  // -------------------------------------------------------------------------
  // Fact-check events
  // -------------------------------------------------------------------------

  /** A fact-check search completed (possibly with zero results) */
  'fact-check:completed': { statement: string; turn: TurnNumber; resultCount: number }

  /** A fact-check search threw; a degradation message was returned instead */
  'fact-check:failed': { statement: string; turn: TurnNumber; error: string }
}
