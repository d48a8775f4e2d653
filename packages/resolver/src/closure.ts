/**
 * Application closure computation.
 *
 * WHY: A release names only its top-level applications. Every runtime
 * dependency and every included application has to be pulled in as well,
 * and the order applications are discovered in becomes their start order.
 *
 * The walk keeps one work queue. Each newly resolved application appends its
 * direct dependencies, then its included applications, to the tail of the
 * queue. Siblings queued earlier are therefore resolved before the
 * dependencies of the application just found.
 */

import type { AppInfo, Goal } from '@relforge/core'
import { AppNotFoundError } from '@relforge/core'

/**
 * Find an application in the world.
 * Matches on name alone, or on name and version when a version is pinned.
 */
export function findApp(world: readonly AppInfo[], goal: Goal): AppInfo | undefined {
  return world.find(
    (app) => app.name === goal.name && (goal.version === undefined || app.version === goal.version)
  )
}

/**
 * Compute the closure of a set of goals over the world.
 *
 * @returns Resolved applications in discovery order, each name once
 * @throws AppNotFoundError on the first goal or dependency missing from the world
 */
export function computeClosure(goals: readonly Goal[], world: readonly AppInfo[]): AppInfo[] {
  const queue: Goal[] = [...goals]
  const seen = new Set<string>()
  const resolved: AppInfo[] = []

  for (let cursor = 0; cursor < queue.length; cursor++) {
    const goal = queue[cursor]
    if (!goal || seen.has(goal.name)) {
      continue
    }

    const app = findApp(world, goal)
    if (!app) {
      throw new AppNotFoundError(goal.name)
    }

    resolved.push(app)
    seen.add(app.name)

    for (const name of app.applications) {
      queue.push({ name })
    }
    for (const name of app.includedApplications) {
      queue.push({ name })
    }
  }

  return resolved
}

/**
 * Collect every name any world entry lists as an included application.
 */
export function worldIncludedApps(world: readonly AppInfo[]): Set<string> {
  const included = new Set<string>()
  for (const app of world) {
    for (const name of app.includedApplications) {
      included.add(name)
    }
  }
  return included
}

/**
 * Get the applications in a resolved set that depend on `name`
 * directly or include it.
 */
export function getDependents(resolved: readonly AppInfo[], name: string): AppInfo[] {
  return resolved.filter(
    (app) => app.applications.includes(name) || app.includedApplications.includes(name)
  )
}
