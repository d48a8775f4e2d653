/**
 * Release resolution.
 *
 * WHY: Turns a release draft into a resolved release in a fixed sequence:
 * 1. Fold the release's config terms into the build state
 * 2. Reject releases without goals
 * 3. Compute the application closure
 * 4. Drop excluded applications
 * 5. Create an application spec per remaining application
 * 6. Fix the runtime version
 *
 * Any failure aborts the whole resolution; no partial release is returned.
 */

import * as semver from 'semver'

import type { AppInfo, Logger, ReleaseDraft, ResolvedRelease } from '@relforge/core'
import {
  BuildState,
  NoGoalsSpecifiedError,
  ReleaseNotFoundError,
  foldConfigTerms,
  goalsFromMap,
  silentLogger,
} from '@relforge/core'

import { createAppSpecs } from './app-spec.js'
import { computeClosure, worldIncludedApps } from './closure.js'
import { excludeApps } from './exclude.js'
import { formatRelease } from './metadata.js'
import { hostRuntimeVersion, realizeRuntime, runtimeSelectorFromState } from './runtime.js'

/** Steps a resolution passes through, in order */
export type ResolutionStage =
  | 'config-applied'
  | 'goals-validated'
  | 'closed'
  | 'filtered'
  | 'specced'
  | 'realized'

/**
 * Options for resolving a release.
 */
export interface ResolveReleaseOptions {
  /** Discovered application packages */
  world: readonly AppInfo[]
  /** Build state to fold the release's config into (default: empty) */
  state?: BuildState | undefined
  /** Version used when the runtime comes from the host (default: running Node.js) */
  hostRuntimeVersion?: string | undefined
  /** Receives progress and the resolved release (default: silent) */
  logger?: Logger | undefined
  /** Called after each completed step */
  onStage?: ((stage: ResolutionStage) => void) | undefined
}

/**
 * Result of resolving a release.
 */
export interface ResolveReleaseResult {
  /** The resolved release */
  release: ResolvedRelease
  /** Build state with the release's config folded in and the release cached */
  state: BuildState
}

/**
 * Resolve a release draft against the world.
 *
 * @throws ConfigValidationError if a release config term is invalid
 * @throws NoGoalsSpecifiedError if the release has no goals
 * @throws AppNotFoundError if a goal or dependency is missing from the world
 * @throws InvalidOverrideShapeError if an override does not fit its application
 * @throws RuntimeDirError if the configured runtime directory holds no runtime
 */
export function resolveRelease(
  draft: ReleaseDraft,
  options: ResolveReleaseOptions
): ResolveReleaseResult {
  const logger = options.logger ?? silentLogger
  const onStage = options.onStage ?? (() => {})
  const { name, version } = draft

  logger.debug(`Solving release ${name}-${version}`)

  const state = foldConfigTerms(options.state ?? BuildState.empty(), draft.config)
  onStage('config-applied')

  if (draft.goals.size === 0) {
    throw new NoGoalsSpecifiedError(name, version)
  }
  onStage('goals-validated')

  const closure = computeClosure(goalsFromMap(draft.goals), options.world)
  onStage('closed')

  const apps = excludeApps(closure, [...state.excludeApps(), ...draft.excludeApps])
  onStage('filtered')

  const appSpecs = createAppSpecs(apps, draft.overrides, worldIncludedApps(options.world))
  onStage('specced')

  const release = realizeRuntime(
    { ...draft, realized: true, appSpecs, appDetail: apps },
    runtimeSelectorFromState(state),
    options.hostRuntimeVersion ?? hostRuntimeVersion()
  )
  onStage('realized')

  logger.info(`Resolved ${name}-${version}`)
  logger.debug(formatRelease(release))

  return { release, state: state.addRealizedRelease(release) }
}

/**
 * Resolve a release declared in the build state by name and version. A
 * release the state already holds as realized is returned as-is.
 *
 * @throws ReleaseNotFoundError if the state holds no such release
 */
export function solveRelease(
  name: string,
  version: string,
  options: ResolveReleaseOptions & { state: BuildState }
): ResolveReleaseResult {
  const realized = options.state.getRealizedRelease(name, version)
  if (realized) {
    return { release: realized, state: options.state }
  }
  const draft = options.state.getConfiguredRelease(name, version)
  if (!draft) {
    throw new ReleaseNotFoundError(name, version)
  }
  return resolveRelease(draft, options)
}

/**
 * Order two release versions. Versions that coerce to semver compare as
 * semver; ties and anything else fall back to plain string order.
 */
export function compareReleaseVersions(a: string, b: string): number {
  const left = semver.coerce(a)
  const right = semver.coerce(b)
  if (left && right) {
    const order = semver.compare(left, right)
    if (order !== 0) {
      return order
    }
  }
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Find the highest configured version of a release.
 */
export function highestConfiguredVersion(state: BuildState, name: string): string | undefined {
  return state
    .configuredReleases()
    .filter((release) => release.name === name)
    .map((release) => release.version)
    .sort(compareReleaseVersions)
    .pop()
}
