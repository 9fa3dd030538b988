/**
 * `rostrum score` command
 *
 * Evaluates every turn of a transcript file in order, optionally
 * fact-checking each argument, and prints the rankings and the winner.
 *
 * Usage:
 *   rostrum score debate.yaml
 *   rostrum score debate.yaml --fact-check --output-format json
 */

import type { Command } from 'commander'
import { TranscriptError } from '../../core/errors.js'
import { createDebateSessionFromConfig } from '../../modules/debate-session/debate-session-impl.js'
import type { DebateResults } from '../../modules/debate-session/debate-session.js'
import { PlaceholderEvaluator } from '../../modules/evaluation/placeholder-evaluator.js'
import { createSearchClient } from '../../modules/fact-check/search-client-factory.js'
import type { Evaluation } from '../../modules/evaluation/types.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_ERROR,
  EXIT_INVALID,
  EXIT_SUCCESS,
  loadCliConfig,
  type CommandDeps,
  type ConfigDirOptions,
} from '../utils/cli-context.js'
import { buildJsonOutput, formatRankingsTable, formatScore } from '../utils/formatting.js'
import { loadTranscript, type Transcript } from '../utils/transcript.js'

const logger = createLogger('score-cmd')

export interface ScoreOptions extends ConfigDirOptions {
  factCheck?: boolean
  outputFormat?: 'table' | 'json'
  version?: string
}

/** One scored turn in the JSON report */
export interface ScoredTurn {
  turn: number
  speaker: string
  evaluation: Evaluation
  factCheck: string | null
}

export interface ScoreReport extends DebateResults {
  turns: ScoredTurn[]
}

export async function runScore(
  transcriptPath: string,
  opts: ScoreOptions = {},
  deps: CommandDeps = {}
): Promise<number> {
  let transcript: Transcript
  try {
    transcript = await loadTranscript(transcriptPath)
  } catch (err) {
    if (err instanceof TranscriptError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return EXIT_INVALID
    }
    throw err
  }

  const env = deps.env ?? process.env
  const loaded = await loadCliConfig(opts, env)
  if (!loaded.ok) return loaded.exitCode

  // --fact-check switches fact-checking on even when the config leaves it off
  let search = deps.search
  if (search === undefined && opts.factCheck === true) {
    search = createSearchClient({ ...loaded.config.fact_check, enabled: true }, env)
    if (search === null) {
      process.stderr.write(`  Warning: ${loaded.config.fact_check.api_key_env} is not set; skipping fact-checks\n`)
    }
  }

  try {
    const session = createDebateSessionFromConfig(
      loaded.config,
      {
        topic: transcript.topic,
        debaters: transcript.debaters,
        ...(opts.factCheck === true && { factChecking: true }),
        ...(deps.llm !== undefined && { llm: deps.llm }),
        ...(search !== undefined && { search }),
        ...(deps.random !== undefined && { placeholder: new PlaceholderEvaluator({ random: deps.random }) }),
      },
      env
    )

    const turns: ScoredTurn[] = []
    for (const t of transcript.turns) {
      if (!transcript.debaters.includes(t.speaker)) {
        process.stderr.write(`  Warning: turn ${String(t.turn)} speaker "${t.speaker}" is not a listed debater; not ranked\n`)
      }
      const evaluation = await session.evaluate(t.speaker, t.argument, t.turn)
      const factCheck = await session.factCheck(t.argument, t.turn)
      turns.push({ turn: t.turn, speaker: t.speaker, evaluation, factCheck })
    }

    const report: ScoreReport = { ...session.results(), turns }

    if (opts.outputFormat === 'json') {
      process.stdout.write(
        JSON.stringify(buildJsonOutput('rostrum score', report, opts.version ?? '0.0.0'), null, 2) + '\n'
      )
    } else {
      process.stdout.write(renderReport(report) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'score failed')
    process.stderr.write(`  Error: ${errorMessage(err)}\n`)
    return EXIT_ERROR
  }
}

function renderReport(report: ScoreReport): string {
  const lines: string[] = [`Topic: ${report.topic}`, '']
  for (const t of report.turns) {
    lines.push(`Turn ${String(t.turn)} ${t.speaker}: ${formatScore(t.evaluation.overallScore)}`)
    if (t.factCheck !== null) {
      lines.push(...t.factCheck.split('\n').map((l) => `    ${l}`))
    }
  }
  lines.push('', formatRankingsTable(report.rankings), '')
  lines.push(
    report.winner === null
      ? 'No winner: no debaters registered'
      : `Winner: ${report.winner} (${formatScore(report.winnerScore)})`
  )
  return lines.join('\n')
}

export function registerScoreCommand(program: Command, version: string, deps: CommandDeps = {}): void {
  program
    .command('score <transcript>')
    .description('Evaluate every turn of a debate transcript and rank the debaters')
    .option('--fact-check', 'Fact-check every argument')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .option('--project-config-dir <dir>', 'Path to project .rostrum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .rostrum/ directory')
    .action(
      async (
        transcript: string,
        opts: {
          factCheck?: boolean
          outputFormat: string
          projectConfigDir?: string
          globalConfigDir?: string
        }
      ) => {
        if (opts.outputFormat !== 'table' && opts.outputFormat !== 'json') {
          process.stderr.write(`  Error: unknown output format "${opts.outputFormat}"\n`)
          process.exitCode = EXIT_INVALID
          return
        }
        const exitCode = await runScore(
          transcript,
          {
            outputFormat: opts.outputFormat,
            version,
            ...(opts.factCheck !== undefined && { factCheck: opts.factCheck }),
            ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
            ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
          },
          deps
        )
        process.exitCode = exitCode
      }
    )
}
