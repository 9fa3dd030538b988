/**
 * Default prompt builder for argument evaluation.
 *
 * Renders the rubric for the five criteria and a JSON response contract.
 * Hosts that manage their own templates inject a different
 * EvaluationPromptBuilder into the pipeline.
 */

import { CRITERIA, CRITERION_DESCRIPTIONS } from './criteria.js'
import type { EvaluationPrompt, EvaluationPromptBuilder, EvaluationRequest } from './types.js'

export const EVALUATOR_SYSTEM_PROMPT =
  'You are an expert debate evaluator who analyzes arguments based on clarity, evidence, ' +
  'reasoning, persuasiveness, and relevance. Always respond with numeric scores between 1-10.'

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}

function buildResponseContract(): string {
  const criteriaLines = CRITERIA.map(
    (c) => `    "${c}": { "score": <score>, "explanation": "<explanation>" }`
  ).join(',\n')
  return [
    '{',
    '  "criteria": {',
    criteriaLines,
    '  },',
    '  "strengths": ["<strength1>", "<strength2>"],',
    '  "weaknesses": ["<weakness1>"],',
    '  "overall_score": <overall_score>,',
    '  "reasoning": "<reasoning>"',
    '}',
  ].join('\n')
}

export function buildEvaluationPrompt(request: EvaluationRequest): EvaluationPrompt {
  const rubric = CRITERIA.map((c) => `- ${capitalize(c)} (1-10): ${CRITERION_DESCRIPTIONS[c]}`)

  const userPrompt = [
    `You are an expert debate evaluator assessing an argument in a debate on the topic: "${request.topic}"`,
    `Please evaluate the following argument made by ${request.speaker} in turn ${String(request.turn)} of the debate.`,
    '',
    'ARGUMENT:',
    request.argument,
    '',
    'EVALUATION CRITERIA:',
    ...rubric,
    '',
    'For each criterion, provide a score from 1-10 (a number, not text) and a brief explanation.',
    'Then provide 2-3 key strengths, 1-2 key weaknesses, an overall score from 1-10 and a brief reasoning.',
    '',
    'Respond with JSON in exactly this format:',
    buildResponseContract(),
    '',
    'IMPORTANT: All scores MUST be numeric values between 1 and 10, not strings.',
  ].join('\n')

  return { systemPrompt: EVALUATOR_SYSTEM_PROMPT, userPrompt }
}

/** The built-in EvaluationPromptBuilder */
export const defaultPromptBuilder: EvaluationPromptBuilder = {
  build: buildEvaluationPrompt,
}
