/**
 * Build state: the context a release resolution runs against.
 *
 * WHY: Config terms, configured releases and realized releases all live in
 * one value that is passed explicitly through resolution. The state is
 * immutable; folding a config term or caching a release returns a new state,
 * so a failed resolution leaves its caller's state untouched.
 */

import { ConfigValidationError } from './errors.js'
import { isAppName } from './types/app.js'
import type { ConfigTerm, ReleaseDraft, ReleaseKey, ResolvedRelease } from './types/release.js'
import { releaseKey } from './types/release.js'

/** Source label used in config term validation errors */
export const CONFIG_TERM_SOURCE = 'config'

/** Runtime inclusion setting: a flag or a runtime installation directory */
export type IncludeErts = boolean | string

interface TermRule {
  expected: string
  check: (value: unknown) => boolean
}

const isBoolean = (value: unknown): boolean => typeof value === 'boolean'
const isString = (value: unknown): boolean => typeof value === 'string' && value.length > 0
const isBooleanOrString = (value: unknown): boolean => isBoolean(value) || isString(value)

/** Value checks for config terms the resolver reads */
const TERM_RULES: ReadonlyMap<string, TermRule> = new Map([
  [
    'exclude_apps',
    {
      expected: 'a list of application names',
      check: (value: unknown) => Array.isArray(value) && value.every((item) => isAppName(item)),
    },
  ],
  ['include_erts', { expected: 'a boolean or a runtime directory', check: isBooleanOrString }],
  ['output_dir', { expected: 'a directory path', check: isString }],
])

export class BuildState {
  private constructor(
    private readonly values: ReadonlyMap<string, unknown>,
    private readonly configured: ReadonlyMap<ReleaseKey, ReleaseDraft>,
    private readonly realized: ReadonlyMap<ReleaseKey, ResolvedRelease>
  ) {}

  static empty(): BuildState {
    return new BuildState(new Map(), new Map(), new Map())
  }

  /** Read a raw config value, or `fallback` when the key was never set */
  get(key: string, fallback?: unknown): unknown {
    return this.values.has(key) ? this.values.get(key) : fallback
  }

  has(key: string): boolean {
    return this.values.has(key)
  }

  /** Return a new state with `key` set; last write wins */
  set(key: string, value: unknown): BuildState {
    const values = new Map(this.values)
    values.set(key, value)
    return new BuildState(values, this.configured, this.realized)
  }

  /** Applications excluded from every release built with this state */
  excludeApps(): string[] {
    const value = this.values.get('exclude_apps')
    if (!Array.isArray(value)) {
      return []
    }
    return value.filter((item): item is string => typeof item === 'string')
  }

  /** Runtime inclusion setting, unset when never configured */
  includeErts(): IncludeErts | undefined {
    const value = this.values.get('include_erts')
    return typeof value === 'boolean' || typeof value === 'string' ? value : undefined
  }

  /** Directory releases are laid out under, unset when never configured */
  outputDir(): string | undefined {
    const value = this.values.get('output_dir')
    return typeof value === 'string' ? value : undefined
  }

  // --------------------------------------------------------------------------
  // Configured releases
  // --------------------------------------------------------------------------

  addConfiguredRelease(release: ReleaseDraft): BuildState {
    const configured = new Map(this.configured)
    configured.set(releaseKey(release.name, release.version), release)
    return new BuildState(this.values, configured, this.realized)
  }

  getConfiguredRelease(name: string, version: string): ReleaseDraft | undefined {
    return this.configured.get(releaseKey(name, version))
  }

  /** Configured releases in declaration order */
  configuredReleases(): ReleaseDraft[] {
    return [...this.configured.values()]
  }

  // --------------------------------------------------------------------------
  // Realized releases
  // --------------------------------------------------------------------------

  addRealizedRelease(release: ResolvedRelease): BuildState {
    const realized = new Map(this.realized)
    realized.set(releaseKey(release.name, release.version), release)
    return new BuildState(this.values, this.configured, realized)
  }

  getRealizedRelease(name: string, version: string): ResolvedRelease | undefined {
    return this.realized.get(releaseKey(name, version))
  }

  realizedReleases(): ResolvedRelease[] {
    return [...this.realized.values()]
  }
}

/**
 * Fold one config term into the build state.
 *
 * @throws ConfigValidationError if a known term carries a value of the wrong kind
 */
export function foldConfigTerm(state: BuildState, term: ConfigTerm): BuildState {
  const [key, value] = term
  const rule = TERM_RULES.get(key)
  if (rule && !rule.check(value)) {
    throw new ConfigValidationError('Invalid config term', CONFIG_TERM_SOURCE, [
      {
        path: `/${key}`,
        message: `expected ${rule.expected}, got ${JSON.stringify(value)}`,
        keyword: 'type',
        params: { key },
      },
    ])
  }
  return state.set(key, value)
}

/** Fold config terms left to right; the first failing term aborts */
export function foldConfigTerms(state: BuildState, terms: readonly ConfigTerm[]): BuildState {
  return terms.reduce<BuildState>((acc, term) => foldConfigTerm(acc, term), state)
}

/** Turn a config table into terms in key order */
export function configTermsFromTable(
  table: Readonly<Record<string, unknown>> | undefined
): ConfigTerm[] {
  return table ? Object.entries(table) : []
}
