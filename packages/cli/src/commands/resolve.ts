/**
 * Resolve command - Resolve a configured release against the world.
 *
 * WHY: Shows exactly which applications a release would ship, in start
 * order, with their start types and the runtime version, without writing
 * anything to disk.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import type { ReleaseMetadata, ResolvedRelease } from '@relforge/core'
import { ReleaseNotFoundError, formatSpecVersion } from '@relforge/core'
import {
  type ResolutionStage,
  type ResolveReleaseResult,
  codePaths,
  getDependents,
  highestConfiguredVersion,
  releaseMetadata,
  releaseOutputDir,
  solveRelease,
} from '@relforge/resolver'

import { type CommonOptions, handleCliError, loadReleaseContext } from '../helpers.js'
import {
  colors,
  createSpinner,
  formatDuration,
  formatPath,
  infoLine,
  symbols,
  treeLines,
} from '../ui.js'

interface ResolveOptions extends CommonOptions {
  outputDir?: string | undefined
  hostRuntime?: string | undefined
}

/** JSON document printed by `resolve --json` */
export interface ResolveOutput extends ReleaseMetadata {
  layout?: { releaseDir: string; codePaths: string[] } | undefined
}

const STAGE_TEXT: Record<ResolutionStage, string> = {
  'config-applied': 'Checking goals...',
  'goals-validated': 'Computing application closure...',
  closed: 'Applying exclusions...',
  filtered: 'Creating application specs...',
  specced: 'Fixing runtime version...',
  realized: 'Done',
}

/**
 * Build the JSON output for a resolved release.
 */
export function buildResolveOutput(
  release: ResolvedRelease,
  outputDir?: string | undefined
): ResolveOutput {
  const metadata = releaseMetadata(release)
  if (!outputDir) {
    return metadata
  }
  return {
    ...metadata,
    layout: {
      releaseDir: releaseOutputDir(outputDir, release),
      codePaths: codePaths(release, outputDir),
    },
  }
}

/**
 * Render a resolved release for the terminal.
 */
export function renderResolveText(
  release: ResolvedRelease,
  outputDir?: string | undefined
): string[] {
  const lines: string[] = []
  lines.push(`${symbols.success} ${chalk.bold(`${release.name}-${release.version}`)}`)
  lines.push(infoLine('runtime', release.runtimeVersion ?? colors.muted('unset')))
  lines.push(infoLine('applications', String(release.appSpecs.length)))
  lines.push('')

  const items = release.appSpecs.map((spec) => {
    const parts = [colors.code(spec.name), formatSpecVersion(spec.version)]
    if (spec.type) {
      parts.push(colors.warn(spec.type))
    }
    if (spec.includedApplications) {
      parts.push(colors.muted(`includes [${spec.includedApplications.join(', ')}]`))
    }
    const dependents = getDependents(release.appDetail, spec.name).map((app) => app.name)
    if (dependents.length > 0) {
      parts.push(colors.dim(`${symbols.arrow} ${dependents.join(', ')}`))
    }
    return parts.join(' ')
  })
  lines.push(...treeLines(items))

  if (outputDir) {
    lines.push('')
    lines.push(infoLine('release dir', formatPath(releaseOutputDir(outputDir, release))))
    for (const path of codePaths(release, outputDir)) {
      lines.push(`    ${colors.dim(formatPath(path))}`)
    }
  }

  return lines
}

/**
 * Register the resolve command.
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve a configured release and show its applications')
    .argument('<release>', 'Release name')
    .argument('[version]', 'Release version (default: highest configured)')
    .option('--config <file>', 'Release file (default: auto-detect relforge.toml)')
    .option('--world <file>', 'World file (default: world.json beside the release file)')
    .option(
      '--output-dir <dir>',
      'Show the output layout under this directory (default: output_dir from config)'
    )
    .option('--host-runtime <version>', 'Runtime version used when the host runtime is included')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Print debug output')
    .action(async (name: string, version: string | undefined, options: ResolveOptions) => {
      try {
        const context = await loadReleaseContext(options)
        const releaseVersion = version ?? highestConfiguredVersion(context.state, name)
        if (!releaseVersion) {
          throw new ReleaseNotFoundError(name)
        }

        const label = `${name}-${releaseVersion}`
        const spinner = options.json ? null : createSpinner(`Resolving ${label}...`)
        spinner?.start()
        const startedAt = Date.now()

        let result: ResolveReleaseResult
        try {
          result = solveRelease(name, releaseVersion, {
            world: context.world,
            state: context.state,
            hostRuntimeVersion: options.hostRuntime,
            logger: context.logger,
            onStage: (stage) => {
              if (spinner) spinner.text = colors.muted(STAGE_TEXT[stage])
            },
          })
        } catch (error) {
          spinner?.fail(colors.error(`Failed to resolve ${label}`))
          throw error
        }
        const elapsed = formatDuration(Date.now() - startedAt)
        spinner?.succeed(colors.muted(`Resolved ${label} in ${elapsed}`))

        const { release, state } = result
        const outputDir = options.outputDir ?? state.outputDir()
        if (options.json) {
          console.log(JSON.stringify(buildResolveOutput(release, outputDir), null, 2))
          return
        }

        console.log('')
        for (const line of renderResolveText(release, outputDir)) {
          console.log(line)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
