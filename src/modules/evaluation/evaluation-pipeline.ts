/**
 * EvaluationPipeline interface definition.
 *
 * A pipeline scores one argument at a time against the five criteria and
 * records the result in its session's ledger.
 */

import type { SpeakerName, TurnNumber } from '../../core/types.js'
import type { Evaluation } from './types.js'

export interface EvaluationPipeline {
  /**
   * Evaluate `argument` by `speaker` at `turn` and record the result.
   *
   * Never rejects: when the LLM is unavailable, fails, returns nothing or
   * returns something unparsable, a placeholder evaluation is produced
   * instead. Evaluations for unregistered speakers are returned but not
   * recorded.
   */
  evaluate(speaker: SpeakerName, argument: string, turn: TurnNumber): Promise<Evaluation>
}
