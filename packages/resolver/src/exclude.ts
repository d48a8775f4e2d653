/**
 * Exclusion of applications from a resolved set.
 *
 * Exclusion runs after the closure is computed and is not transitive: the
 * dependencies of an excluded application stay in the release.
 */

import type { AppInfo } from '@relforge/core'

/**
 * Remove each excluded name from the resolved set.
 * Only the first entry with a matching name is removed; unknown names are ignored.
 */
export function excludeApps(resolved: readonly AppInfo[], excludes: readonly string[]): AppInfo[] {
  const remaining = [...resolved]
  for (const name of excludes) {
    const index = remaining.findIndex((app) => app.name === name)
    if (index !== -1) {
      remaining.splice(index, 1)
    }
  }
  return remaining
}
