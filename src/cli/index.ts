#!/usr/bin/env node
/**
 * rostrum CLI - Main entry point
 * Provides the `rostrum` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerEvaluateCommand } from './commands/evaluate.js'
import { registerFactCheckCommand } from './commands/fact-check.js'
import { registerScoreCommand } from './commands/score.js'
import { EXIT_ERROR } from './utils/cli-context.js'

const logger = createLogger('cli')

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli or src/cli
  const paths = [resolve(__dirname, '../../package.json'), resolve(__dirname, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('rostrum')
    .description('rostrum - Score debate arguments and rank debaters')
    .version(version, '-v, --version', 'Output the current version')

  registerEvaluateCommand(program, version)
  registerScoreCommand(program, version)
  registerFactCheckCommand(program, version)
  registerConfigCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(EXIT_ERROR)
  }
}

void main()
