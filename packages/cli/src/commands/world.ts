/**
 * World command - List the application packages a world file describes.
 *
 * WHY: Resolution failures usually mean an application is missing from the
 * world or has an unexpected version. This shows what the resolver sees.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import type { AppInfo } from '@relforge/core'
import { readWorldJson } from '@relforge/core'
import { worldIncludedApps } from '@relforge/resolver'

import { type CommonOptions, handleCliError, locateWorldPath } from '../helpers.js'
import { colors, formatPath, symbols } from '../ui.js'

/** One application in `world --json` output */
export interface ListedApp extends AppInfo {
  /** Listed as an included application by some package */
  included: boolean
}

/**
 * Annotate world entries with whether another package includes them.
 */
export function buildWorldOutput(world: readonly AppInfo[]): ListedApp[] {
  const included = worldIncludedApps(world)
  return world.map((app) => ({ ...app, included: included.has(app.name) }))
}

/**
 * Render world entries for the terminal.
 */
export function renderWorldText(worldPath: string, apps: readonly ListedApp[]): string[] {
  const lines = [chalk.blue(`Applications in ${formatPath(worldPath)}`), '']

  if (apps.length === 0) {
    lines.push(colors.muted('  No applications'))
    return lines
  }

  for (const app of apps) {
    const marker = app.included ? colors.muted(' (included)') : ''
    lines.push(`${symbols.bullet} ${colors.code(app.name)} ${app.version}${marker}`)
    if (app.applications.length > 0) {
      lines.push(`    depends on: ${app.applications.join(', ')}`)
    }
    if (app.includedApplications.length > 0) {
      lines.push(`    includes: ${app.includedApplications.join(', ')}`)
    }
  }

  return lines
}

/**
 * Register the world command.
 */
export function registerWorldCommand(program: Command): void {
  program
    .command('world')
    .description('List the application packages in the world file')
    .option('--config <file>', 'Release file used to locate world.json')
    .option('--world <file>', 'World file (default: world.json beside the release file)')
    .option('--json', 'Output as JSON')
    .action(async (options: CommonOptions) => {
      try {
        const worldPath = await locateWorldPath(options)
        const apps = buildWorldOutput(await readWorldJson(worldPath))

        if (options.json) {
          console.log(JSON.stringify(apps, null, 2))
          return
        }

        for (const line of renderWorldText(worldPath, apps)) {
          console.log(line)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
