/**
 * Unit tests for the `rostrum fact-check` command
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

import { runFactCheck, FACT_CHECK_DISABLED_NOTICE } from '../fact-check.js'
import { EXIT_INVALID, EXIT_SUCCESS } from '../../utils/cli-context.js'
import { FACT_CHECK_ERROR_MESSAGE } from '../../../modules/fact-check/fact-check-adapter.js'
import type { SearchClient } from '../../../modules/fact-check/types.js'

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `rostrum-fact-check-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, '.rostrum')
  globalConfigDir = join(testDir, 'global', '.rostrum')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

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

async function enableFactChecking(): Promise<void> {
  await writeFile(join(projectConfigDir, 'config.yaml'), 'fact_check:\n  enabled: true\n  max_results: 2\n', 'utf-8')
}

describe('runFactCheck', () => {
  it('prints the notice when fact-checking is disabled', async () => {
    const { getStdout, getStderr } = captureOutput()

    const exitCode = await runFactCheck('Water boils at 90C.', { projectConfigDir, globalConfigDir }, { env: {} })

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(getStdout()).toBe('')
    expect(getStderr()).toBe(`  ${FACT_CHECK_DISABLED_NOTICE}\n`)
  })

  it('prints the formatted sources', async () => {
    await enableFactChecking()
    const { getStdout } = captureOutput()
    const search: SearchClient = {
      id: 'fake',
      search: vi.fn(() =>
        Promise.resolve([{ title: 'Physics notes', url: 'https://example.org/boil', content: '100C at sea level.' }])
      ),
    }

    const exitCode = await runFactCheck(
      'Water boils at 90C.',
      { projectConfigDir, globalConfigDir, turn: '4' },
      { search, env: {} }
    )

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(search.search).toHaveBeenCalledWith('fact check: Water boils at 90C.', {
      maxResults: 2,
      searchDepth: 'advanced',
    })
    expect(getStdout()).toBe(
      'Fact check for turn 4: "Water boils at 90C."\n\n' +
        'Source: Physics notes\nURL: https://example.org/boil\nContent: 100C at sea level.\n'
    )
  })

  it('prints the error message when the search fails', async () => {
    await enableFactChecking()
    const { getStdout } = captureOutput()
    const search: SearchClient = { id: 'fake', search: () => Promise.reject(new Error('HTTP 429')) }

    const exitCode = await runFactCheck('claim', { projectConfigDir, globalConfigDir }, { search, env: {} })

    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(getStdout()).toBe(`${FACT_CHECK_ERROR_MESSAGE}\n`)
  })

  it('rejects an empty statement', async () => {
    captureOutput()
    expect(await runFactCheck('  ', { projectConfigDir, globalConfigDir }, { env: {} })).toBe(EXIT_INVALID)
  })

  it('rejects a bad turn', async () => {
    captureOutput()
    expect(await runFactCheck('claim', { projectConfigDir, globalConfigDir, turn: 'two' }, { env: {} })).toBe(
      EXIT_INVALID
    )
  })
})
