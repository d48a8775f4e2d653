/**
 * Core types for relforge
 */

// Application types
export type { AppInfo, Goal, StartType } from './app.js'

export {
  DEFAULT_START_TYPE,
  formatGoal,
  goalsFromMap,
  isAppName,
  isStartType,
  parseGoal,
  START_TYPES,
} from './app.js'

// Override and spec types
export type {
  AppOverride,
  AppOverrideKind,
  ApplicationSpec,
  SpecTuple,
  SpecVersion,
} from './overrides.js'

export {
  formatSpecVersion,
  parseAppOverride,
  parseAppOverrides,
  toSpecTuple,
} from './overrides.js'

// Release types
export type {
  ConfigTerm,
  Release,
  ReleaseDraft,
  ReleaseKey,
  ReleaseMetadata,
  ResolvedRelease,
  RuntimeTag,
} from './release.js'

export { createReleaseDraft, isResolvedRelease, releaseKey } from './release.js'

// File formats
export type {
  ConfigTable,
  ReleaseFile,
  ReleaseFileEntry,
  WorldFile,
  WorldFileEntry,
} from './files.js'
