/**
 * Application spec synthesis.
 *
 * Reconciles a release's per-application override (if any) with the
 * resolved package to produce the spec emitted for the release.
 */

import type { AppInfo, AppOverride, ApplicationSpec, StartType } from '@relforge/core'
import { DEFAULT_START_TYPE, InvalidOverrideShapeError } from '@relforge/core'

/**
 * Find the override for an application: the first entry with its name.
 */
export function findOverride(
  overrides: readonly AppOverride[],
  name: string
): AppOverride | undefined {
  return overrides.find((override) => override.name === name)
}

/**
 * Default start type: `load` for applications some package includes,
 * `permanent` otherwise.
 */
export function defaultStartType(name: string, worldIncluded: ReadonlySet<string>): StartType {
  return worldIncluded.has(name) ? 'load' : DEFAULT_START_TYPE
}

/** Attach a start type, leaving the default `permanent` implicit */
function withType(spec: ApplicationSpec, type: StartType): ApplicationSpec {
  return type === DEFAULT_START_TYPE ? spec : { ...spec, type }
}

/**
 * Create the application spec for one resolved application.
 *
 * @param override - The release's override for this application, if any
 * @param app - The resolved package
 * @param worldIncluded - Names listed as included applications anywhere in the world
 * @throws InvalidOverrideShapeError if a `(name, version)` override names another version
 */
export function createAppSpec(
  override: AppOverride | undefined,
  app: AppInfo,
  worldIncluded: ReadonlySet<string>
): ApplicationSpec {
  const defaultType = defaultStartType(app.name, worldIncluded)

  if (!override) {
    return withType({ name: app.name, version: app.version }, defaultType)
  }

  switch (override.kind) {
    case 'name':
      return withType({ name: app.name, version: app.version }, defaultType)
    case 'version':
      if (override.version !== app.version) {
        throw new InvalidOverrideShapeError(
          `version ${override.version} does not match resolved version ${app.version}`,
          override.name
        )
      }
      return withType({ name: override.name, version: override.version }, defaultType)
    case 'full':
      // Taken as given, including an explicit permanent type
      return {
        name: override.name,
        version: override.version,
        type: override.type,
        includedApplications: override.includedApplications,
      }
    case 'type':
      return withType({ name: override.name, version: app.version }, override.type)
    case 'version-type':
      return withType({ name: override.name, version: override.version }, override.type)
    case 'included':
      return withType(
        {
          name: override.name,
          version: app.version,
          includedApplications: override.includedApplications,
        },
        defaultType
      )
    default: {
      const unhandled: never = override
      throw new InvalidOverrideShapeError(`unrecognized override ${JSON.stringify(unhandled)}`)
    }
  }
}

/**
 * Create specs for every resolved application, in order.
 */
export function createAppSpecs(
  apps: readonly AppInfo[],
  overrides: readonly AppOverride[],
  worldIncluded: ReadonlySet<string>
): ApplicationSpec[] {
  return apps.map((app) => createAppSpec(findOverride(overrides, app.name), app, worldIncluded))
}
