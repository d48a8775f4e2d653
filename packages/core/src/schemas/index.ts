/**
 * JSON Schema validation for relforge config files
 */

import { createRequire } from 'node:module'
import { Ajv, type ErrorObject, type SchemaObject } from 'ajv'

import type { ReleaseFile, WorldFile } from '../types/files.js'

const require = createRequire(import.meta.url)
const releaseSchema: SchemaObject = require('./release.schema.json')
const worldSchema: SchemaObject = require('./world.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

const validateReleaseSchema = ajv.compile<ReleaseFile>(releaseSchema)
const validateWorldSchema = ajv.compile<WorldFile>(worldSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message ?? 'Unknown error'

  if (err.keyword === 'additionalProperties') {
    return `unknown property "${String(err.params['additionalProperty'])}"`
  }

  if (err.keyword === 'pattern' && err.instancePath.includes('/goals/')) {
    return `"${String(err.data)}" is not a valid goal. Use format: <app> or <app>@<version> (e.g., kernel or kernel@9.2)`
  }

  if (err.keyword === 'pattern') {
    return `"${String(err.data)}" is not a valid application name`
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a release configuration (relforge.toml parsed to object)
 */
export function validateReleaseFile(data: unknown): ValidationResult<ReleaseFile> {
  if (validateReleaseSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateReleaseSchema.errors) }
}

/**
 * Validate a world description (world.json parsed to array)
 */
export function validateWorldFile(data: unknown): ValidationResult<WorldFile> {
  if (validateWorldSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateWorldSchema.errors) }
}

// ============================================================================
// Schema exports for external use
// ============================================================================

export { releaseSchema, worldSchema }
