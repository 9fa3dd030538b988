/**
 * `rostrum fact-check` command
 *
 * Looks one statement up through the configured search service.
 */

import type { Command } from 'commander'
import { FactCheckAdapter } from '../../modules/fact-check/fact-check-adapter.js'
import { createSearchClient } from '../../modules/fact-check/search-client-factory.js'
import {
  EXIT_INVALID,
  EXIT_SUCCESS,
  loadCliConfig,
  parseTurn,
  type CommandDeps,
  type ConfigDirOptions,
} from '../utils/cli-context.js'

export const FACT_CHECK_DISABLED_NOTICE =
  'Fact-checking is disabled. Set fact_check.enabled to true and export the search API key.'

export interface FactCheckOptions extends ConfigDirOptions {
  turn?: string
}

export async function runFactCheck(
  statement: string,
  opts: FactCheckOptions = {},
  deps: CommandDeps = {}
): Promise<number> {
  if (statement.trim() === '') {
    process.stderr.write('  Error: statement must not be empty\n')
    return EXIT_INVALID
  }
  const turn = parseTurn(opts.turn)
  if (turn === undefined) {
    process.stderr.write(`  Error: --turn must be a positive integer, got "${opts.turn ?? ''}"\n`)
    return EXIT_INVALID
  }

  const env = deps.env ?? process.env
  const loaded = await loadCliConfig(opts, env)
  if (!loaded.ok) return loaded.exitCode

  const { fact_check: factCheckConfig } = loaded.config
  const adapter = new FactCheckAdapter({
    search: deps.search !== undefined ? deps.search : createSearchClient(factCheckConfig, env),
    enabled: factCheckConfig.enabled,
    maxResults: factCheckConfig.max_results,
    snippetLength: factCheckConfig.snippet_length,
  })

  const text = await adapter.factCheck(statement, turn)
  if (text === null) {
    process.stderr.write(`  ${FACT_CHECK_DISABLED_NOTICE}\n`)
    return EXIT_SUCCESS
  }
  process.stdout.write(text + '\n')
  return EXIT_SUCCESS
}

export function registerFactCheckCommand(program: Command, _version: string, deps: CommandDeps = {}): void {
  program
    .command('fact-check <statement>')
    .description('Fact-check a statement against web sources')
    .option('--turn <n>', 'Turn number shown in the output', '1')
    .option('--project-config-dir <dir>', 'Path to project .rostrum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .rostrum/ directory')
    .action(
      async (
        statement: string,
        opts: { turn: string; projectConfigDir?: string; globalConfigDir?: string }
      ) => {
        const exitCode = await runFactCheck(
          statement,
          {
            turn: opts.turn,
            ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
            ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
          },
          deps
        )
        process.exitCode = exitCode
      }
    )
}
