/**
 * Unit tests for the `rostrum score` command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'

vi.mock('../../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
  setLogLevel: vi.fn(),
}))

import { runScore, type ScoreReport } from '../score.js'
import { EXIT_INVALID, EXIT_SUCCESS } from '../../utils/cli-context.js'
import type { CompletionRequest, LlmClient } from '../../../modules/llm/types.js'
import type { SearchClient } from '../../../modules/fact-check/types.js'
import { NO_RESULTS_MESSAGE } from '../../../modules/fact-check/fact-check-adapter.js'

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `rostrum-score-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, '.rostrum')
  globalConfigDir = join(testDir, 'global', '.rostrum')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function captureOutput(): { getStdout: () => string; getStderr: () => string } {
  let stdout = ''
  let stderr = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : data.toString()
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : data.toString()
    return true
  })
  return { getStdout: () => stdout, getStderr: () => stderr }
}

async function writeTranscript(content: string): Promise<string> {
  const file = join(testDir, 'debate.yaml')
  await writeFile(file, content, 'utf-8')
  return file
}

const TRANSCRIPT = `topic: Cities should ban private cars
debaters: [Alice, Bob]
turns:
  - speaker: Alice
    argument: Car-free centres cut pollution.
  - speaker: Bob
    argument: Bans hurt people far from transit.
  - speaker: Alice
    argument: Transit can be extended.
`

/** Scores each call with the next value of `scores` */
function scriptedLlm(scores: number[]): LlmClient {
  let call = 0
  return {
    id: 'scripted',
    complete: (_request: CompletionRequest) => {
      const score = scores[call++] ?? 5
      const criterion = { score, explanation: 'x' }
      return Promise.resolve(
        JSON.stringify({
          criteria: {
            clarity: criterion,
            evidence: criterion,
            reasoning: criterion,
            persuasiveness: criterion,
            relevance: criterion,
          },
          strengths: ['s'],
          weaknesses: ['w'],
          overall_score: score,
          reasoning: 'r',
        })
      )
    },
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('runScore', () => {
  it('ranks debaters by mean score and names the winner', async () => {
    const { getStdout } = captureOutput()
    const file = await writeTranscript(TRANSCRIPT)

    const exitCode = await runScore(
      file,
      { projectConfigDir, globalConfigDir },
      { llm: scriptedLlm([8, 7, 6]), env: {} }
    )

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(getStdout()).toBe(
      [
        'Topic: Cities should ban private cars',
        '',
        'Turn 1 Alice: 8.0',
        'Turn 2 Bob: 7.0',
        'Turn 3 Alice: 6.0',
        '',
        'Rank | Speaker | Score | Arguments',
        '-----+---------+-------+----------',
        '1    | Alice   | 7.0   | 2        ',
        '2    | Bob     | 7.0   | 1        ',
        '',
        'Winner: Alice (7.0)',
      ].join('\n') + '\n'
    )
  })

  it('prints a JSON report with every turn', async () => {
    const { getStdout } = captureOutput()
    const file = await writeTranscript(TRANSCRIPT)

    await runScore(
      file,
      { projectConfigDir, globalConfigDir, outputFormat: 'json' },
      { llm: scriptedLlm([6, 9, 6]), env: {} }
    )

    const output = JSON.parse(getStdout()) as { command: string; data: ScoreReport }
    expect(output.command).toBe('rostrum score')
    expect(output.data.winner).toBe('Bob')
    expect(output.data.winnerScore).toBe(9)
    expect(output.data.turns.map((t) => [t.turn, t.speaker, t.evaluation.overallScore, t.factCheck])).toEqual([
      [1, 'Alice', 6, null],
      [2, 'Bob', 9, null],
      [3, 'Alice', 6, null],
    ])
  })

  it('fact-checks every argument with --fact-check', async () => {
    const { getStdout } = captureOutput()
    const file = await writeTranscript(TRANSCRIPT)
    const search: SearchClient = { id: 'fake', search: vi.fn(() => Promise.resolve([])) }

    await runScore(
      file,
      { projectConfigDir, globalConfigDir, factCheck: true, outputFormat: 'json' },
      { llm: scriptedLlm([7, 7, 7]), search, env: {} }
    )

    expect(search.search).toHaveBeenCalledTimes(3)
    const output = JSON.parse(getStdout()) as { data: ScoreReport }
    expect(output.data.turns.map((t) => t.factCheck)).toEqual([
      NO_RESULTS_MESSAGE,
      NO_RESULTS_MESSAGE,
      NO_RESULTS_MESSAGE,
    ])
  })

  it('warns when --fact-check has no search key', async () => {
    const { getStderr } = captureOutput()
    const file = await writeTranscript(TRANSCRIPT)

    const exitCode = await runScore(
      file,
      { projectConfigDir, globalConfigDir, factCheck: true },
      { llm: scriptedLlm([7, 7, 7]), env: {} }
    )

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(getStderr()).toBe('  Warning: TAVILY_API_KEY is not set; skipping fact-checks\n')
  })

  it('warns about speakers that are not listed debaters', async () => {
    const { getStderr } = captureOutput()
    const file = await writeTranscript(`topic: t
debaters: [Alice]
turns:
  - speaker: Mallory
    argument: Interjection.
`)

    const exitCode = await runScore(
      file,
      { projectConfigDir, globalConfigDir },
      { llm: scriptedLlm([9]), env: {} }
    )

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(getStderr()).toBe('  Warning: turn 1 speaker "Mallory" is not a listed debater; not ranked\n')
  })

  it('rejects a transcript without debaters', async () => {
    const { getStderr } = captureOutput()
    const file = await writeTranscript('topic: t\ndebaters: []\nturns: []\n')

    expect(await runScore(file, { projectConfigDir, globalConfigDir }, { env: {} })).toBe(EXIT_INVALID)
    expect(getStderr().startsWith(`  Error: Invalid transcript ${file}:`)).toBe(true)
  })

  it('rejects a missing transcript file', async () => {
    captureOutput()
    const exitCode = await runScore(join(testDir, 'nope.yaml'), { projectConfigDir, globalConfigDir }, { env: {} })
    expect(exitCode).toBe(EXIT_INVALID)
  })
})
