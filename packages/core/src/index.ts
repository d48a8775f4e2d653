/**
 * @relforge/core
 *
 * Core library for relforge
 * Provides types, schemas, config parsing, build state, logging hooks and errors.
 */

// Types
export * from './types/index.js'

// Schemas
export { releaseSchema, validateReleaseFile, validateWorldFile, worldSchema } from './schemas/index.js'
export type { ValidationError, ValidationResult } from './schemas/index.js'

// Config parsers
export {
  createBuildState,
  fromReleaseFile,
  fromWorldFile,
  parseReleaseToml,
  parseWorldJson,
  readReleaseToml,
  readWorldJson,
  RELEASE_CONFIG_FILENAME,
  toReleaseDraft,
  WORLD_FILENAME,
} from './config/index.js'
export type { ReleaseConfig } from './config/index.js'

// Build state
export {
  BuildState,
  CONFIG_TERM_SOURCE,
  configTermsFromTable,
  foldConfigTerm,
  foldConfigTerms,
} from './state.js'
export type { IncludeErts } from './state.js'

// Logging
export { LOG_LEVELS, shouldLog, silentLogger } from './logger.js'
export type { LogLevel, Logger } from './logger.js'

// Errors
export {
  AppNotFoundError,
  ConfigError,
  ConfigParseError,
  ConfigValidationError,
  formatError,
  InvalidOverrideShapeError,
  isConfigError,
  isRelforgeError,
  isResolutionError,
  NoGoalsSpecifiedError,
  RelforgeError,
  ReleaseNotFoundError,
  ReleaseNotRealizedError,
  ResolutionError,
  RuntimeDirError,
} from './errors.js'
