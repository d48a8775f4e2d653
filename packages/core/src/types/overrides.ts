/**
 * Application override and application spec types for relforge
 *
 * A release may override how each of its applications is emitted. Overrides
 * arrive from configuration in several loose forms:
 *
 * - `"name"`
 * - `["name", "<version>"]`, `["name", "<type>"]`, `["name", ["incl", ...]]`
 * - `["name", "<version>", "<type>"]`
 * - `["name", "<version>" | ["incl", ...], "<type>", ["incl", ...]]`
 * - `{ name, version?, type?, included_applications? }`
 *
 * `parseAppOverride` turns any of these into one `AppOverride` case, so the
 * resolver never sees an unvalidated shape.
 */

import { InvalidOverrideShapeError } from '../errors.js'
import { type StartType, isAppName, isStartType } from './app.js'

/**
 * Second slot of an application spec. Only the four-field override can put
 * an included list there; every other spec carries a version string.
 */
export type SpecVersion = string | string[]

/** A parsed per-application override */
export type AppOverride =
  | { kind: 'name'; name: string }
  | { kind: 'version'; name: string; version: string }
  | { kind: 'type'; name: string; type: StartType }
  | { kind: 'included'; name: string; includedApplications: string[] }
  | { kind: 'version-type'; name: string; version: string; type: StartType }
  | {
      kind: 'full'
      name: string
      version: SpecVersion
      type: StartType
      includedApplications: string[]
    }

export type AppOverrideKind = AppOverride['kind']

/** Canonical application spec emitted for a release */
export interface ApplicationSpec {
  name: string
  version: SpecVersion
  /** Start type; absent means `permanent` */
  type?: StartType | undefined
  /** Included applications override */
  includedApplications?: string[] | undefined
}

/** Positional form of an application spec */
export type SpecTuple =
  | [name: string, version: SpecVersion]
  | [name: string, version: SpecVersion, typeOrIncluded: StartType | string[]]
  | [name: string, version: SpecVersion, type: StartType, included: string[]]

// ============================================================================
// Parsing
// ============================================================================

const TABLE_KEYS = new Set(['name', 'version', 'type', 'included_applications'])

function isNameList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => isAppName(item))
}

function isVersion(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0 && !isStartType(value)
}

function describe(value: unknown): string {
  return JSON.stringify(value) ?? String(value)
}

function parseTuple(tuple: unknown[]): AppOverride {
  const [name, second, third, fourth] = tuple
  if (!isAppName(name)) {
    throw new InvalidOverrideShapeError(`expected an application name first in ${describe(tuple)}`)
  }

  switch (tuple.length) {
    case 2:
      if (isStartType(second)) {
        return { kind: 'type', name, type: second }
      }
      if (isVersion(second)) {
        return { kind: 'version', name, version: second }
      }
      if (isNameList(second)) {
        return { kind: 'included', name, includedApplications: second }
      }
      break
    case 3:
      if (isVersion(second) && isStartType(third)) {
        return { kind: 'version-type', name, version: second, type: third }
      }
      break
    case 4:
      if ((isVersion(second) || isNameList(second)) && isStartType(third) && isNameList(fourth)) {
        return {
          kind: 'full',
          name,
          version: second,
          type: third,
          includedApplications: fourth,
        }
      }
      break
  }

  throw new InvalidOverrideShapeError(`unrecognized override ${describe(tuple)}`, name)
}

function readOptional<T>(
  table: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  name: string,
  expected: string
): T | undefined {
  const value = table[key]
  if (value === undefined) {
    return undefined
  }
  if (!guard(value)) {
    throw new InvalidOverrideShapeError(`${key} must be ${expected}, got ${describe(value)}`, name)
  }
  return value
}

function parseTable(table: Record<string, unknown>): AppOverride {
  const name = table['name']
  if (!isAppName(name)) {
    throw new InvalidOverrideShapeError(`expected "name" in ${describe(table)}`)
  }

  const unknownKey = Object.keys(table).find((key) => !TABLE_KEYS.has(key))
  if (unknownKey) {
    throw new InvalidOverrideShapeError(`unknown property "${unknownKey}"`, name)
  }

  const version = readOptional(table, 'version', isVersion, name, 'a version string')
  const type = readOptional(table, 'type', isStartType, name, 'a start type')
  const included = readOptional(
    table,
    'included_applications',
    isNameList,
    name,
    'a list of application names'
  )

  if (version === undefined && type === undefined && included === undefined) {
    return { kind: 'name', name }
  }
  if (version === undefined && type === undefined && included !== undefined) {
    return { kind: 'included', name, includedApplications: included }
  }
  if (version === undefined && type !== undefined && included === undefined) {
    return { kind: 'type', name, type }
  }
  if (version !== undefined && type === undefined && included === undefined) {
    return { kind: 'version', name, version }
  }
  if (version !== undefined && type !== undefined) {
    return included === undefined
      ? { kind: 'version-type', name, version, type }
      : { kind: 'full', name, version, type, includedApplications: included }
  }

  throw new InvalidOverrideShapeError(
    'included_applications can only be combined with both a version and a type',
    name
  )
}

/**
 * Parse one loose override entry from configuration.
 *
 * @throws InvalidOverrideShapeError if the entry matches no override shape
 */
export function parseAppOverride(entry: unknown): AppOverride {
  if (typeof entry === 'string') {
    if (!isAppName(entry)) {
      throw new InvalidOverrideShapeError(`invalid application name ${describe(entry)}`)
    }
    return { kind: 'name', name: entry }
  }
  if (Array.isArray(entry)) {
    return parseTuple(entry)
  }
  if (typeof entry === 'object' && entry !== null) {
    return parseTable({ ...entry })
  }
  throw new InvalidOverrideShapeError(`unrecognized override ${describe(entry)}`)
}

/** Parse a list of loose override entries, preserving order */
export function parseAppOverrides(entries: readonly unknown[]): AppOverride[] {
  return entries.map((entry) => parseAppOverride(entry))
}

// ============================================================================
// Spec rendering
// ============================================================================

/** Render a spec version slot: a version as-is, an included list as `[a, b]` */
export function formatSpecVersion(version: SpecVersion): string {
  return typeof version === 'string' ? version : `[${version.join(', ')}]`
}

/**
 * Render an application spec in its positional form.
 * `type` sits before the included list whenever both are present.
 */
export function toSpecTuple(spec: ApplicationSpec): SpecTuple {
  const { name, version, type, includedApplications } = spec
  if (type !== undefined && includedApplications !== undefined) {
    return [name, version, type, includedApplications]
  }
  if (type !== undefined) {
    return [name, version, type]
  }
  if (includedApplications !== undefined) {
    return [name, version, includedApplications]
  }
  return [name, version]
}
