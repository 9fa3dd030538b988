import { describe, it, expect } from 'vitest'
import { buildJsonOutput, formatRankingsTable, formatScore, formatTable } from '../formatting.js'

describe('formatTable', () => {
  it('aligns columns to the widest cell', () => {
    const table = formatTable(['Name', 'N'], [{ name: 'Al', n: '100' }], ['name', 'n'])
    expect(table).toBe(['Name | N  ', '-----+----', 'Al   | 100'].join('\n'))
  })
})

describe('formatScore', () => {
  it('always shows one decimal', () => {
    expect(formatScore(7)).toBe('7.0')
    expect(formatScore(8.25)).toBe('8.3')
  })
})

describe('formatRankingsTable', () => {
  it('numbers rows from 1', () => {
    const table = formatRankingsTable([
      { name: 'Bob', total: 8.5, evaluationCount: 2 },
      { name: 'Alice', total: 6, evaluationCount: 1 },
    ])
    expect(table.split('\n')).toEqual([
      'Rank | Speaker | Score | Arguments',
      '-----+---------+-------+----------',
      '1    | Bob     | 8.5   | 2        ',
      '2    | Alice   | 6.0   | 1        ',
    ])
  })
})

describe('buildJsonOutput', () => {
  it('wraps the payload with command metadata', () => {
    const output = buildJsonOutput('rostrum score', { winner: 'Bob' }, '0.1.0')
    expect(output.command).toBe('rostrum score')
    expect(output.version).toBe('0.1.0')
    expect(output.data).toEqual({ winner: 'Bob' })
    expect(Number.isNaN(Date.parse(output.timestamp))).toBe(false)
  })
})
