/**
 * The closed set of criteria every evaluation scores.
 */

export const CRITERIA = ['clarity', 'evidence', 'reasoning', 'persuasiveness', 'relevance'] as const

export type Criterion = (typeof CRITERIA)[number]

/** Rubric text shown to the evaluating model for each criterion */
export const CRITERION_DESCRIPTIONS: Readonly<Record<Criterion, string>> = {
  clarity: 'How clear and understandable the argument is',
  evidence: 'The quality and relevance of evidence and examples provided',
  reasoning: 'The logical coherence and soundness of reasoning',
  persuasiveness: 'How convincing and compelling the overall argument is',
  relevance: 'How relevant the argument is to the debate topic',
}

export function isCriterion(value: string): value is Criterion {
  return CRITERIA.some((c) => c === value)
}
