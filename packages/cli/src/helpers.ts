/**
 * Shared CLI helper utilities.
 *
 * WHY: Reduces cognitive complexity across CLI commands by extracting
 * common patterns like config discovery, context loading and error
 * handling into reusable functions.
 */

import { access } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'

import chalk from 'chalk'

import {
  type AppInfo,
  type BuildState,
  type Logger,
  type ReleaseConfig,
  RELEASE_CONFIG_FILENAME,
  WORLD_FILENAME,
  createBuildState,
  formatError,
  isConfigError,
  readReleaseToml,
  readWorldJson,
} from '@relforge/core'

import { createCliLogger, isVerbose } from './logger.js'

/**
 * Common CLI options that most commands accept.
 */
export interface CommonOptions {
  config?: string | undefined
  world?: string | undefined
  json?: boolean | undefined
  verbose?: boolean | undefined
}

/**
 * Loaded inputs for a CLI command.
 */
export interface ReleaseContext {
  configPath: string
  worldPath: string
  config: ReleaseConfig
  state: BuildState
  world: AppInfo[]
  logger: Logger
}

/**
 * Error thrown when no release file can be found.
 */
export class ConfigNotFoundError extends Error {
  constructor() {
    super(`No ${RELEASE_CONFIG_FILENAME} found in current directory or parents`)
    this.name = 'ConfigNotFoundError'
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/**
 * Find the release file by walking up from `startDir`.
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let dir = resolve(startDir)

  for (;;) {
    const candidate = join(dir, RELEASE_CONFIG_FILENAME)
    if (await exists(candidate)) {
      return candidate
    }
    const parent = dirname(dir)
    if (parent === dir) {
      return null
    }
    dir = parent
  }
}

/**
 * Resolve the config path from options or by discovery.
 * Throws if no release file can be found.
 */
export async function getConfigPath(options: CommonOptions): Promise<string> {
  if (options.config) {
    return resolve(options.config)
  }
  const found = await findConfigFile()
  if (!found) {
    throw new ConfigNotFoundError()
  }
  return found
}

/**
 * World file path: the `--world` option, or `world.json` beside the release file.
 */
export function getWorldPath(options: CommonOptions, configPath: string): string {
  return options.world ? resolve(options.world) : join(dirname(configPath), WORLD_FILENAME)
}

/**
 * World file path for commands that do not need the release file itself.
 */
export async function locateWorldPath(options: CommonOptions): Promise<string> {
  if (options.world) {
    return resolve(options.world)
  }
  return getWorldPath(options, await getConfigPath(options))
}

/**
 * Load the release file, the world and the base build state.
 */
export async function loadReleaseContext(options: CommonOptions): Promise<ReleaseContext> {
  const logger = createCliLogger({ verbose: isVerbose(options.verbose) })

  const configPath = await getConfigPath(options)
  logger.debug(`Reading ${configPath}`)
  const config = await readReleaseToml(configPath)

  const worldPath = getWorldPath(options, configPath)
  logger.debug(`Reading ${worldPath}`)
  const world = await readWorldJson(worldPath)

  return {
    configPath,
    worldPath,
    config,
    state: createBuildState(config),
    world,
    logger,
  }
}

/**
 * Handle CLI errors with consistent formatting.
 * Prints error message and exits with code 1.
 */
export function handleCliError(error: unknown): never {
  console.error(chalk.red(`Error: ${formatError(error)}`))
  if (error instanceof ConfigNotFoundError) {
    console.error(chalk.gray('Run this command from a release directory or use --config'))
  } else if (isConfigError(error)) {
    console.error(chalk.gray(`  Source: ${error.source}`))
  }
  process.exit(1)
}
