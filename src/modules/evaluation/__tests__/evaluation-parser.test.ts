/**
 * Unit tests for evaluation-parser.ts
 */

import { describe, it, expect, vi } from 'vitest'

vi.mock('../../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

import {
  parseEvaluation,
  DEFAULT_STRENGTHS,
  DEFAULT_WEAKNESSES,
  DEFAULT_REASONING,
} from '../evaluation-parser.js'
import type { ParseResult } from '../types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fullResponse(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    criteria: {
      clarity: { score: 8, explanation: 'Easy to follow' },
      evidence: { score: 6, explanation: 'One study cited' },
      reasoning: { score: 7, explanation: 'Sound' },
      persuasiveness: { score: 7.5, explanation: 'Fairly convincing' },
      relevance: { score: 9, explanation: 'On topic' },
    },
    strengths: ['Concrete example', 'Clear thesis'],
    weaknesses: ['Thin sourcing'],
    overall_score: 7.4,
    reasoning: 'A focused argument with limited evidence.',
    ...overrides,
  })
}

function expectParsed(result: ParseResult): Extract<ParseResult, { status: 'parsed' }> {
  if (result.status !== 'parsed') {
    throw new Error(`expected parsed result, got ${result.reason}: ${result.message}`)
  }
  return result
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('parseEvaluation - complete responses', () => {
  it('maps every field of a well-formed response', () => {
    const { evaluation, warnings } = expectParsed(parseEvaluation(fullResponse(), 'Alice', 2))

    expect(evaluation).toEqual({
      speaker: 'Alice',
      turn: 2,
      overallScore: 7.4,
      criteriaScores: { clarity: 8, evidence: 6, reasoning: 7, persuasiveness: 7.5, relevance: 9 },
      strengths: ['Concrete example', 'Clear thesis'],
      weaknesses: ['Thin sourcing'],
      reasoning: 'A focused argument with limited evidence.',
    })
    expect(warnings).toEqual([])
  })

  it('returns a frozen evaluation', () => {
    const { evaluation } = expectParsed(parseEvaluation(fullResponse(), 'Alice', 1))
    expect(Object.isFrozen(evaluation)).toBe(true)
    expect(Object.isFrozen(evaluation.criteriaScores)).toBe(true)
    expect(Object.isFrozen(evaluation.strengths)).toBe(true)
  })

  it('extracts the payload from a fenced block inside prose', () => {
    const raw = `Sure! Here is the evaluation.\n\n\`\`\`json\n${fullResponse()}\n\`\`\`\nLet me know if you need more.`
    const { evaluation } = expectParsed(parseEvaluation(raw, 'Bob', 3))
    expect(evaluation.overallScore).toBe(7.4)
  })

  it('ignores a later fenced block that is not the evaluation', () => {
    const raw = `\`\`\`json\n${fullResponse()}\n\`\`\`\n\`\`\`json\n{"model_confidence": 0.8}\n\`\`\``
    const { evaluation } = expectParsed(parseEvaluation(raw, 'Bob', 3))
    expect(evaluation.overallScore).toBe(7.4)
  })

  it('accepts bare numbers and numeric strings as criterion entries', () => {
    const raw = fullResponse({
      criteria: { clarity: 8, evidence: '6.5', reasoning: { score: '7' }, persuasiveness: 7, relevance: 9 },
    })
    const { evaluation, warnings } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.criteriaScores).toEqual({
      clarity: 8,
      evidence: 6.5,
      reasoning: 7,
      persuasiveness: 7,
      relevance: 9,
    })
    expect(warnings).toEqual([])
  })

  it('matches criterion names case-insensitively', () => {
    const raw = fullResponse({
      criteria: { Clarity: 4, EVIDENCE: 5, Reasoning: 6, Persuasiveness: 7, Relevance: 8 },
    })
    const { evaluation } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.criteriaScores).toEqual({
      clarity: 4,
      evidence: 5,
      reasoning: 6,
      persuasiveness: 7,
      relevance: 8,
    })
  })

  it('clamps and rounds out-of-range scores', () => {
    const raw = fullResponse({
      criteria: { clarity: 12, evidence: 0, reasoning: 6.66, persuasiveness: 7, relevance: 8 },
      overall_score: 11,
    })
    const { evaluation } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.criteriaScores.clarity).toBe(10)
    expect(evaluation.criteriaScores.evidence).toBe(1)
    expect(evaluation.criteriaScores.reasoning).toBe(6.7)
    expect(evaluation.overallScore).toBe(10)
  })
})

describe('parseEvaluation - repairs', () => {
  it('fills a missing criterion with 5.0 and reports it', () => {
    const raw = fullResponse({
      criteria: { clarity: 8, evidence: 6, reasoning: 7, persuasiveness: 7 },
    })
    const { evaluation, warnings } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(Object.keys(evaluation.criteriaScores)).toEqual([
      'clarity',
      'evidence',
      'reasoning',
      'persuasiveness',
      'relevance',
    ])
    expect(evaluation.criteriaScores.relevance).toBe(5)
    expect(warnings).toEqual([{ field: 'criteria.relevance', issue: 'missing', substituted: 5 }])
  })

  it('replaces a non-numeric criterion score with 5.0', () => {
    const raw = fullResponse({
      criteria: { clarity: 'excellent', evidence: 6, reasoning: 7, persuasiveness: 7, relevance: 9 },
    })
    const { evaluation, warnings } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.criteriaScores.clarity).toBe(5)
    expect(warnings).toEqual([{ field: 'criteria.clarity', issue: 'invalid_score', substituted: 5 }])
  })

  it('computes a missing overall score as the mean of the criteria', () => {
    const raw = fullResponse({ overall_score: undefined })
    const { evaluation, warnings } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    // (8 + 6 + 7 + 7.5 + 9) / 5 = 7.5
    expect(evaluation.overallScore).toBe(7.5)
    expect(warnings).toEqual([{ field: 'overall_score', issue: 'missing', substituted: 7.5 }])
  })

  it('computes an unparsable overall score as the mean of the criteria', () => {
    const raw = fullResponse({ overall_score: 'seven' })
    const { evaluation, warnings } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.overallScore).toBe(7.5)
    expect(warnings).toEqual([{ field: 'overall_score', issue: 'invalid_score', substituted: 7.5 }])
  })

  it('substitutes single-item lists for missing strengths and weaknesses', () => {
    const raw = fullResponse({ strengths: undefined, weaknesses: [] })
    const { evaluation, warnings } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.strengths).toEqual([...DEFAULT_STRENGTHS])
    expect(evaluation.weaknesses).toEqual([...DEFAULT_WEAKNESSES])
    expect(warnings).toEqual([
      { field: 'strengths', issue: 'missing', substituted: DEFAULT_STRENGTHS },
      { field: 'weaknesses', issue: 'empty', substituted: DEFAULT_WEAKNESSES },
    ])
  })

  it('wraps a single string strength into a list', () => {
    const raw = fullResponse({ strengths: '  Vivid imagery ' })
    const { evaluation } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.strengths).toEqual(['Vivid imagery'])
  })

  it('defaults missing reasoning', () => {
    const raw = fullResponse({ reasoning: '' })
    const { evaluation, warnings } = expectParsed(parseEvaluation(raw, 'Alice', 1))
    expect(evaluation.reasoning).toBe(DEFAULT_REASONING)
    expect(warnings).toEqual([{ field: 'reasoning', issue: 'missing', substituted: DEFAULT_REASONING }])
  })
})

describe('parseEvaluation - failures', () => {
  it('fails with no_json_block when the response has no object', () => {
    const result = parseEvaluation('The argument is decent, about a seven.', 'Alice', 1)
    expect(result).toEqual({
      status: 'failed',
      reason: 'no_json_block',
      message: 'No JSON object found in output',
    })
  })

  it('fails with missing_criteria when the object lacks criteria', () => {
    const raw = JSON.stringify({ overall_score: 8, strengths: ['Good'], weaknesses: ['Short'] })
    const result = parseEvaluation(raw, 'Alice', 1)
    expect(result).toEqual({
      status: 'failed',
      reason: 'missing_criteria',
      message: 'Decoded response has no "criteria" key',
    })
  })

  it('fails with invalid_criteria when criteria is not an object', () => {
    const result = parseEvaluation(fullResponse({ criteria: [8, 6, 7, 7, 9] }), 'Alice', 1)
    expect(result.status).toBe('failed')
    if (result.status === 'failed') {
      expect(result.reason).toBe('invalid_criteria')
    }
  })

  it('fails with invalid_json when the object cannot be decoded', () => {
    const result = parseEvaluation('{"criteria": {"clarity": 8,}', 'Alice', 1)
    expect(result.status).toBe('failed')
    if (result.status === 'failed') {
      expect(result.reason).toBe('invalid_json')
    }
  })
})
