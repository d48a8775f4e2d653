/**
 * Output layout of a realized release.
 *
 * <output_dir>/
 * ├── <release>/releases/<version>/   # release files
 * └── lib/<app>-<version>/ebin/       # per-application code
 */

import { join } from 'node:path'

import type { ResolvedRelease } from '@relforge/core'

/**
 * Directory holding the files of one release version.
 */
export function releaseOutputDir(
  outputDir: string,
  release: { name: string; version: string }
): string {
  return join(outputDir, release.name, 'releases', release.version)
}

/**
 * Code path of every application in the release, in start order.
 */
export function codePaths(release: ResolvedRelease, outputDir: string): string[] {
  const libDir = join(outputDir, 'lib')
  return release.appDetail.map((app) => join(libDir, `${app.name}-${app.version}`, 'ebin'))
}
