/**
 * List command - List the releases a release file declares.
 *
 * WHY: Provides an overview of what can be resolved, and which releases
 * already pin a runtime version or carry their own config.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import type { BuildState, ReleaseDraft } from '@relforge/core'
import { createBuildState, formatGoal, goalsFromMap, readReleaseToml } from '@relforge/core'
import { compareReleaseVersions } from '@relforge/resolver'

import { type CommonOptions, getConfigPath, handleCliError } from '../helpers.js'
import { colors, formatPath, symbols } from '../ui.js'

/** One release in `list --json` output */
export interface ListedRelease {
  name: string
  version: string
  goals: string[]
  excludeApps: string[]
  overrides: number
  runtimeVersion?: string | undefined
}

/** JSON document printed by `list --json` */
export interface ListOutput {
  configPath: string
  excludeApps: string[]
  releases: ListedRelease[]
}

function sortReleases(releases: readonly ReleaseDraft[]): ReleaseDraft[] {
  return [...releases].sort(
    (a, b) => a.name.localeCompare(b.name) || compareReleaseVersions(a.version, b.version)
  )
}

/**
 * Build the list output from a build state.
 */
export function buildListOutput(configPath: string, state: BuildState): ListOutput {
  return {
    configPath,
    excludeApps: state.excludeApps(),
    releases: sortReleases(state.configuredReleases()).map((release) => ({
      name: release.name,
      version: release.version,
      goals: goalsFromMap(release.goals).map(formatGoal),
      excludeApps: release.excludeApps,
      overrides: release.overrides.length,
      runtimeVersion: release.runtimeVersion,
    })),
  }
}

/**
 * Render the list output for the terminal.
 */
export function renderListText(output: ListOutput): string[] {
  const lines = [chalk.blue(`Releases in ${formatPath(output.configPath)}`), '']

  if (output.releases.length === 0) {
    lines.push(colors.muted('  No releases declared'))
    return lines
  }

  for (const release of output.releases) {
    const runtime = release.runtimeVersion ? colors.muted(` (erts ${release.runtimeVersion})`) : ''
    lines.push(`${symbols.bullet} ${chalk.bold(`${release.name}-${release.version}`)}${runtime}`)
    lines.push(`    goals: ${release.goals.join(', ') || colors.muted('none')}`)
    if (release.excludeApps.length > 0) {
      lines.push(`    excludes: ${release.excludeApps.join(', ')}`)
    }
    if (release.overrides > 0) {
      lines.push(`    overrides: ${release.overrides}`)
    }
  }

  if (output.excludeApps.length > 0) {
    lines.push('')
    lines.push(colors.muted(`Excluded everywhere: ${output.excludeApps.join(', ')}`))
  }

  return lines
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List the releases declared in the release file')
    .option('--config <file>', 'Release file (default: auto-detect relforge.toml)')
    .option('--json', 'Output as JSON')
    .action(async (options: CommonOptions) => {
      try {
        const configPath = await getConfigPath(options)
        const state = createBuildState(await readReleaseToml(configPath))
        const output = buildListOutput(configPath, state)

        if (options.json) {
          console.log(JSON.stringify(output, null, 2))
          return
        }

        for (const line of renderListText(output)) {
          console.log(line)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
