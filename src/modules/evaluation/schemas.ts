/**
 * Zod schemas for the evaluation response contract.
 *
 * The decoded response is untrusted model output. These schemas only pin the
 * structure the parser relies on; score fields stay `unknown` so that the
 * normalizer can repair them instead of rejecting the whole response.
 */

import { z } from 'zod'

/**
 * One criterion entry. Models are asked for `{ score, explanation }` but
 * sometimes answer with the bare score.
 */
export const RawCriterionSchema = z.union([
  z
    .object({
      score: z.unknown(),
      explanation: z.unknown().optional(),
    })
    .passthrough(),
  z.number(),
  z.string(),
])

export type RawCriterion = z.infer<typeof RawCriterionSchema>

/**
 * Top-level evaluation response. Only `criteria` is required; it must be an
 * object keyed by criterion name.
 */
export const RawEvaluationResponseSchema = z
  .object({
    criteria: z.record(z.string(), z.unknown()),
    strengths: z.unknown().optional(),
    weaknesses: z.unknown().optional(),
    overall_score: z.unknown().optional(),
    reasoning: z.unknown().optional(),
  })
  .passthrough()

export type RawEvaluationResponse = z.infer<typeof RawEvaluationResponseSchema>
