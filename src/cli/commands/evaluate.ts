/**
 * `rostrum evaluate` command
 *
 * Scores a single argument against the five criteria and prints the
 * evaluation.
 *
 * Usage:
 *   rostrum evaluate --topic "..." --speaker Alice --argument "..."
 *   rostrum evaluate --topic "..." --speaker Alice --file argument.txt --output-format json
 */

import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import { createDebateSessionFromConfig } from '../../modules/debate-session/debate-session-impl.js'
import { PlaceholderEvaluator } from '../../modules/evaluation/placeholder-evaluator.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_ERROR,
  EXIT_INVALID,
  EXIT_SUCCESS,
  loadCliConfig,
  parseTurn,
  type CommandDeps,
  type ConfigDirOptions,
} from '../utils/cli-context.js'
import { buildJsonOutput, formatEvaluation } from '../utils/formatting.js'

const logger = createLogger('evaluate-cmd')

export interface EvaluateOptions extends ConfigDirOptions {
  topic: string
  speaker: string
  turn?: string
  argument?: string
  file?: string
  outputFormat?: 'text' | 'json'
  version?: string
}

export async function runEvaluate(opts: EvaluateOptions, deps: CommandDeps = {}): Promise<number> {
  const turn = parseTurn(opts.turn)
  if (turn === undefined) {
    process.stderr.write(`  Error: --turn must be a positive integer, got "${opts.turn ?? ''}"\n`)
    return EXIT_INVALID
  }

  if ((opts.argument === undefined) === (opts.file === undefined)) {
    process.stderr.write('  Error: provide exactly one of --argument or --file\n')
    return EXIT_INVALID
  }

  let argument: string
  if (opts.file !== undefined) {
    try {
      argument = await readFile(opts.file, 'utf-8')
    } catch (err) {
      process.stderr.write(`  Error: cannot read ${opts.file}: ${errorMessage(err)}\n`)
      return EXIT_INVALID
    }
  } else {
    argument = opts.argument ?? ''
  }

  if (argument.trim() === '') {
    process.stderr.write('  Error: argument text is empty\n')
    return EXIT_INVALID
  }

  const env = deps.env ?? process.env
  const loaded = await loadCliConfig(opts, env)
  if (!loaded.ok) return loaded.exitCode

  try {
    const session = createDebateSessionFromConfig(
      loaded.config,
      {
        topic: opts.topic,
        debaters: [opts.speaker],
        ...(deps.llm !== undefined && { llm: deps.llm }),
        ...(deps.random !== undefined && { placeholder: new PlaceholderEvaluator({ random: deps.random }) }),
      },
      env
    )

    const evaluation = await session.evaluate(opts.speaker, argument, turn)

    if (opts.outputFormat === 'json') {
      process.stdout.write(
        JSON.stringify(buildJsonOutput('rostrum evaluate', evaluation, opts.version ?? '0.0.0'), null, 2) + '\n'
      )
    } else {
      process.stdout.write(formatEvaluation(evaluation) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'evaluate failed')
    process.stderr.write(`  Error: ${errorMessage(err)}\n`)
    return EXIT_ERROR
  }
}

export function registerEvaluateCommand(program: Command, version: string, deps: CommandDeps = {}): void {
  program
    .command('evaluate')
    .description('Evaluate one debate argument')
    .requiredOption('--topic <topic>', 'Debate topic')
    .requiredOption('--speaker <name>', 'Speaker who made the argument')
    .option('--turn <n>', 'Turn number', '1')
    .option('--argument <text>', 'Argument text')
    .option('--file <path>', 'Read the argument from a file')
    .option('--output-format <format>', 'Output format: text (default) or json', 'text')
    .option('--project-config-dir <dir>', 'Path to project .rostrum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .rostrum/ directory')
    .action(
      async (opts: {
        topic: string
        speaker: string
        turn: string
        argument?: string
        file?: string
        outputFormat: string
        projectConfigDir?: string
        globalConfigDir?: string
      }) => {
        if (opts.outputFormat !== 'text' && opts.outputFormat !== 'json') {
          process.stderr.write(`  Error: unknown output format "${opts.outputFormat}"\n`)
          process.exitCode = EXIT_INVALID
          return
        }
        const exitCode = await runEvaluate(
          {
            topic: opts.topic,
            speaker: opts.speaker,
            turn: opts.turn,
            outputFormat: opts.outputFormat,
            version,
            ...(opts.argument !== undefined && { argument: opts.argument }),
            ...(opts.file !== undefined && { file: opts.file }),
            ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
            ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
          },
          deps
        )
        process.exitCode = exitCode
      }
    )
}
