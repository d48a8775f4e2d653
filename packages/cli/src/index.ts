/**
 * @relforge/cli - Command line interface for relforge.
 *
 * WHY: Provides a thin argument parsing layer that delegates
 * all resolution logic to the resolver package. This keeps the CLI
 * focused on user interaction while the resolver handles the algorithm.
 */

import { pathToFileURL } from 'node:url'

import chalk from 'chalk'
import { Command } from 'commander'

import { formatError, isRelforgeError } from '@relforge/core'

import { registerListCommand } from './commands/list.js'
import { registerResolveCommand } from './commands/resolve.js'
import { registerWorldCommand } from './commands/world.js'

/**
 * Format error for display.
 */
export function formatCliError(error: unknown): string {
  const lines: string[] = [chalk.red(`Error: ${formatError(error)}`)]
  if (isRelforgeError(error) && error.cause instanceof Error) {
    lines.push(chalk.gray(`  Cause: ${error.cause.message}`))
  } else if (isRelforgeError(error) && typeof error.cause === 'string') {
    lines.push(chalk.gray(`  Cause: ${error.cause}`))
  }
  return lines.join('\n')
}

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('relforge')
    .description('relforge - Resolve release contents from application packages')
    .version('0.1.0')

  registerResolveCommand(program)
  registerListCommand(program)
  registerWorldCommand(program)

  return program
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(process.argv)
  } catch (error) {
    console.error(formatCliError(error))
    process.exit(1)
  }
}

// Only run if this is the main module (not imported in tests)
const entry = process.argv[1]
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error: unknown) => {
    console.error(formatCliError(error))
    process.exit(1)
  })
}
