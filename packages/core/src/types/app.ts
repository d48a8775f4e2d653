/**
 * Application types for relforge
 *
 * An application package is a discovered unit in the world: a name, a
 * version, the applications it depends on at runtime, and the applications
 * it includes (loaded alongside it but never started on their own).
 *
 * A goal is an application the release author asks for directly:
 * `<name>` (any version) or `<name>@<version>` (pinned).
 */

/** A discovered application package */
export interface AppInfo {
  /** Application name */
  name: string
  /** Application version */
  version: string
  /** Direct runtime dependencies, in declared order */
  applications: string[]
  /** Applications loaded but not started by this one, in declared order */
  includedApplications: string[]
}

/** A top-level application requested by a release */
export interface Goal {
  name: string
  /** Pinned version; any version matches when unset */
  version?: string | undefined
}

/** Start behavior of an application inside a running release */
export type StartType = 'permanent' | 'transient' | 'temporary' | 'load' | 'none'

/** All start types; `permanent` is the default */
export const START_TYPES: readonly StartType[] = [
  'permanent',
  'transient',
  'temporary',
  'load',
  'none',
]

export const DEFAULT_START_TYPE: StartType = 'permanent'

// ============================================================================
// Type guards and constructors
// ============================================================================

const APP_NAME_PATTERN = /^[a-z][a-zA-Z0-9_]*$/
const GOAL_PATTERN = /^([a-z][a-zA-Z0-9_]*)(?:@(.+))?$/

export function isStartType(value: unknown): value is StartType {
  return START_TYPES.some((type) => type === value)
}

export function isAppName(value: unknown): value is string {
  return typeof value === 'string' && APP_NAME_PATTERN.test(value)
}

/**
 * Parse a goal string: `<name>` or `<name>@<version>`.
 * Returns null when the string is not a goal.
 */
export function parseGoal(goal: string): Goal | null {
  const match = GOAL_PATTERN.exec(goal.trim())
  if (!match?.[1]) {
    return null
  }
  return match[2] ? { name: match[1], version: match[2] } : { name: match[1] }
}

/** Format a goal back to `<name>` or `<name>@<version>` */
export function formatGoal(goal: Goal): string {
  return goal.version ? `${goal.name}@${goal.version}` : goal.name
}

/** Convert a release's goal mapping into goals, preserving declaration order */
export function goalsFromMap(goals: ReadonlyMap<string, string | undefined>): Goal[] {
  return [...goals].map(([name, version]) => (version ? { name, version } : { name }))
}
