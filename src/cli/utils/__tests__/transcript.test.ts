import { describe, it, expect } from 'vitest'
import { parseTranscript } from '../transcript.js'
import { TranscriptError } from '../../../core/errors.js'

describe('parseTranscript', () => {
  it('numbers turns by position when no turn is given', () => {
    const transcript = parseTranscript({
      topic: 'Four-day week',
      debaters: ['Alice', 'Bob'],
      turns: [
        { speaker: 'Alice', argument: 'Output holds steady.' },
        { speaker: 'Bob', argument: 'Coverage suffers.' },
      ],
    })

    expect(transcript.turns).toEqual([
      { turn: 1, speaker: 'Alice', argument: 'Output holds steady.' },
      { turn: 2, speaker: 'Bob', argument: 'Coverage suffers.' },
    ])
  })

  it('keeps explicit turn numbers', () => {
    const transcript = parseTranscript({
      topic: 't',
      debaters: ['Alice'],
      turns: [{ turn: 7, speaker: 'Alice', argument: 'a' }],
    })
    expect(transcript.turns[0]?.turn).toBe(7)
  })

  it('accepts a transcript with no turns', () => {
    expect(parseTranscript({ topic: 't', debaters: ['Alice'], turns: [] }).turns).toEqual([])
  })

  it('rejects unknown fields', () => {
    expect(() =>
      parseTranscript({ topic: 't', debaters: ['Alice'], turns: [], moderator: 'Zed' }, 'debate.yaml')
    ).toThrow(TranscriptError)
  })

  it('names the source and the failing path', () => {
    expect(() =>
      parseTranscript({ topic: 't', debaters: ['Alice'], turns: [{ speaker: 'Alice', argument: '' }] }, 'd.yaml')
    ).toThrow(/^Invalid transcript d\.yaml:\n  • turns\.0\.argument: /)
  })

  it('rejects a document that is not an object', () => {
    expect(() => parseTranscript('just text')).toThrow(TranscriptError)
  })
})
