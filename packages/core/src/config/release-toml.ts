/**
 * Release configuration (relforge.toml) parser
 */

import { readFile } from 'node:fs/promises'
import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import { validateReleaseFile } from '../schemas/index.js'
import { BuildState, configTermsFromTable, foldConfigTerms } from '../state.js'
import { parseGoal } from '../types/app.js'
import type { ReleaseFile, ReleaseFileEntry } from '../types/files.js'
import { parseAppOverrides } from '../types/overrides.js'
import type { ConfigTerm, ReleaseDraft } from '../types/release.js'
import { createReleaseDraft } from '../types/release.js'

/** Default filename for release configuration */
export const RELEASE_CONFIG_FILENAME = 'relforge.toml'

/** Parsed release configuration */
export interface ReleaseConfig {
  /** Global config terms, in declared order */
  config: ConfigTerm[]
  /** Release declarations, in declared order */
  releases: ReleaseDraft[]
}

function toGoalMap(entry: ReleaseFileEntry, source: string): Map<string, string | undefined> {
  const goals = new Map<string, string | undefined>()
  for (const [index, goalString] of (entry.goals ?? []).entries()) {
    const goal = parseGoal(goalString)
    if (!goal) {
      throw new ConfigValidationError(`Invalid release ${entry.name}`, source, [
        {
          path: `/release/${entry.name}/goals/${index}`,
          message: `"${goalString}" is not a valid goal`,
          keyword: 'pattern',
          params: {},
        },
      ])
    }
    goals.set(goal.name, goal.version)
  }
  return goals
}

/**
 * Build a release draft from a `[[release]]` entry
 *
 * @throws ConfigValidationError if a goal is malformed
 * @throws InvalidOverrideShapeError if an application override is malformed
 */
export function toReleaseDraft(entry: ReleaseFileEntry, source = RELEASE_CONFIG_FILENAME): ReleaseDraft {
  return createReleaseDraft(entry.name, entry.version, {
    runtimeVersion: entry.runtime_version,
    goals: toGoalMap(entry, source),
    overrides: parseAppOverrides(entry.applications ?? []),
    config: configTermsFromTable(entry.config),
    excludeApps: entry.exclude_apps ?? [],
  })
}

/**
 * Parse relforge.toml content into validated release configuration
 *
 * @param content - Raw TOML string content
 * @param filePath - Path to the file (for error messages)
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 * @throws InvalidOverrideShapeError if an application override is malformed
 */
export function parseReleaseToml(content: string, filePath?: string): ReleaseConfig {
  const source = filePath ?? RELEASE_CONFIG_FILENAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  const result = validateReleaseFile(parsed)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${RELEASE_CONFIG_FILENAME}`, source, result.errors)
  }

  return fromReleaseFile(result.data, source)
}

/** Convert a validated release file into release configuration */
export function fromReleaseFile(file: ReleaseFile, source = RELEASE_CONFIG_FILENAME): ReleaseConfig {
  return {
    config: configTermsFromTable(file.config),
    releases: (file.release ?? []).map((entry) => toReleaseDraft(entry, source)),
  }
}

/**
 * Read and parse a relforge.toml file from disk
 *
 * @param filePath - Path to the relforge.toml file
 */
export async function readReleaseToml(filePath: string): Promise<ReleaseConfig> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
      throw new ConfigParseError('File not found', filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
  return parseReleaseToml(content, filePath)
}

/**
 * Create the base build state for a release configuration: global config
 * terms folded in order, every declared release registered.
 *
 * @throws ConfigValidationError if a global config term is invalid
 */
export function createBuildState(config: ReleaseConfig, base = BuildState.empty()): BuildState {
  return config.releases.reduce<BuildState>(
    (state, release) => state.addConfiguredRelease(release),
    foldConfigTerms(base, config.config)
  )
}
