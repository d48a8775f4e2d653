/**
 * Release types for relforge
 *
 * A release starts as a draft built from configuration and becomes a
 * resolved release once its application closure, specs and runtime version
 * are fixed. Only resolved releases produce metadata.
 */

import type { AppInfo } from './app.js'
import type { AppOverride, ApplicationSpec, SpecTuple } from './overrides.js'

/** A single config term: key and raw value, applied in declared order */
export type ConfigTerm = readonly [key: string, value: unknown]

/** Release cache key format: `<name>-<version>` */
export type ReleaseKey = `${string}-${string}`

/** A release as declared in configuration, not yet resolved */
export interface ReleaseDraft {
  name: string
  version: string
  /** Runtime version fixed by configuration; host or runtime dir decides when unset */
  runtimeVersion?: string | undefined
  realized: false
  /** Per-application overrides, first match per name wins */
  overrides: AppOverride[]
  /** Top-level applications, name to optional pinned version */
  goals: Map<string, string | undefined>
  /** Per-release config terms folded over the build state */
  config: ConfigTerm[]
  /** Applications dropped from the resolved set */
  excludeApps: string[]
}

/** A fully resolved release */
export interface ResolvedRelease extends Omit<ReleaseDraft, 'realized'> {
  realized: true
  /** Application specs in start order */
  appSpecs: ApplicationSpec[]
  /** Resolved application packages, same order as appSpecs */
  appDetail: AppInfo[]
}

export type Release = ReleaseDraft | ResolvedRelease

/** Runtime tag embedded in release metadata */
export interface RuntimeTag {
  name: 'erts'
  version: string | undefined
}

/** Release metadata consumed by serializers */
export interface ReleaseMetadata {
  release: { name: string; version: string }
  runtime: RuntimeTag
  applications: SpecTuple[]
}

/** Build the cache key for a release */
export function releaseKey(name: string, version: string): ReleaseKey {
  return `${name}-${version}`
}

export function isResolvedRelease(release: Release): release is ResolvedRelease {
  return release.realized
}

/** Create an empty draft; callers fill in goals, overrides and config */
export function createReleaseDraft(
  name: string,
  version: string,
  fields: Partial<Omit<ReleaseDraft, 'name' | 'version' | 'realized'>> = {}
): ReleaseDraft {
  return {
    name,
    version,
    runtimeVersion: fields.runtimeVersion,
    realized: false,
    overrides: fields.overrides ?? [],
    goals: fields.goals ?? new Map(),
    config: fields.config ?? [],
    excludeApps: fields.excludeApps ?? [],
  }
}
