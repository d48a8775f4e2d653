/**
 * Typed error classes for relforge
 *
 * Error hierarchy:
 * - RelforgeError (base)
 *   - ConfigError (configuration issues)
 *     - ConfigParseError (TOML/JSON parse failures)
 *     - ConfigValidationError (schema or config term validation failures)
 *   - ResolutionError (release resolution failures)
 *     - NoGoalsSpecifiedError (release lists no applications)
 *     - AppNotFoundError (goal or dependency missing from the world)
 *     - ReleaseNotFoundError (release not declared in configuration)
 *     - InvalidOverrideShapeError (unrecognized application override)
 *     - ReleaseNotRealizedError (metadata requested before realization)
 *   - RuntimeDirError (runtime directory scan failed)
 */

import type { ValidationError } from './schemas/index.js'

/** Base error class for all relforge errors */
export class RelforgeError extends Error {
  readonly code: string

  constructor(message: string, code: string) {
    super(message)
    this.name = 'RelforgeError'
    this.code = code
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends RelforgeError {
  readonly source: string

  constructor(message: string, code: string, source: string) {
    super(message, code)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when TOML/JSON parsing fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(message, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema or config term validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Resolution errors
// ============================================================================

/** Base class for resolution-related errors */
export class ResolutionError extends RelforgeError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'ResolutionError'
  }
}

/** Error thrown when a release declares no goals */
export class NoGoalsSpecifiedError extends ResolutionError {
  readonly releaseName: string
  readonly releaseVersion: string

  constructor(releaseName: string, releaseVersion: string) {
    super(
      `No applications configured to be included in release ${releaseName}-${releaseVersion}`,
      'NO_GOALS_SPECIFIED'
    )
    this.name = 'NoGoalsSpecifiedError'
    this.releaseName = releaseName
    this.releaseVersion = releaseVersion
  }
}

/** Error thrown when a goal or one of its dependencies is not in the world */
export class AppNotFoundError extends ResolutionError {
  readonly appName: string

  constructor(appName: string) {
    super(`Application needed for release not found: ${appName}`, 'APP_NOT_FOUND')
    this.name = 'AppNotFoundError'
    this.appName = appName
  }
}

/** Error thrown when the release itself is not declared */
export class ReleaseNotFoundError extends ResolutionError {
  readonly releaseName: string
  /** Absent when no version of the release is configured at all */
  readonly releaseVersion: string | undefined

  constructor(releaseName: string, releaseVersion?: string) {
    super(
      releaseVersion === undefined
        ? `No release named ${releaseName} found in configuration`
        : `No release named ${releaseName} of version ${releaseVersion} found in configuration`,
      'RELEASE_NOT_FOUND'
    )
    this.name = 'ReleaseNotFoundError'
    this.releaseName = releaseName
    this.releaseVersion = releaseVersion
  }
}

/** Error thrown when an application override has no recognized shape */
export class InvalidOverrideShapeError extends ResolutionError {
  readonly appName: string | undefined
  readonly detail: string

  constructor(detail: string, appName?: string) {
    super(
      `Invalid application override for ${appName ?? '<unnamed>'}: ${detail}`,
      'INVALID_OVERRIDE_SHAPE'
    )
    this.name = 'InvalidOverrideShapeError'
    this.appName = appName
    this.detail = detail
  }
}

/** Error thrown when metadata is requested for a release that was never realized */
export class ReleaseNotRealizedError extends ResolutionError {
  readonly releaseName: string
  readonly releaseVersion: string

  constructor(releaseName: string, releaseVersion: string) {
    super(
      `Unable to produce metadata for release ${releaseName}-${releaseVersion}: release has not been realized`,
      'RELEASE_NOT_REALIZED'
    )
    this.name = 'ReleaseNotRealizedError'
    this.releaseName = releaseName
    this.releaseVersion = releaseVersion
  }
}

// ============================================================================
// Runtime errors
// ============================================================================

/** Error thrown when no runtime can be found in a runtime directory */
export class RuntimeDirError extends RelforgeError {
  readonly dir: string

  constructor(dir: string, options?: { cause?: unknown }) {
    super(`Unable to find runtime in ${dir}`, 'RUNTIME_DIR_ERROR')
    this.name = 'RuntimeDirError'
    this.dir = dir
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isRelforgeError(error: unknown): error is RelforgeError {
  return error instanceof RelforgeError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render any thrown value as a single human-readable message.
 * Pure; callers decide where the text goes.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
