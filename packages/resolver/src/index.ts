/**
 * Release resolution engine for relforge.
 *
 * WHY: This package handles the complete resolution process:
 * - Compute application closures over the world
 * - Apply exclusions
 * - Synthesize application specs from overrides
 * - Fix the runtime version
 * - Produce release metadata and output layout
 */

// Closure
export { computeClosure, findApp, getDependents, worldIncludedApps } from './closure.js'

// Exclusion
export { excludeApps } from './exclude.js'

// Application specs
export { createAppSpec, createAppSpecs, defaultStartType, findOverride } from './app-spec.js'

// Runtime
export {
  hostRuntimeVersion,
  realizeRuntime,
  RUNTIME_NAME,
  runtimeOsType,
  runtimeSelectorFromState,
  scanRuntimeDir,
} from './runtime.js'
export type { RuntimeScanResult, RuntimeSelector } from './runtime.js'

// Release resolution
export {
  compareReleaseVersions,
  highestConfiguredVersion,
  resolveRelease,
  solveRelease,
} from './release.js'
export type { ResolutionStage, ResolveReleaseOptions, ResolveReleaseResult } from './release.js'

// Metadata and layout
export { formatRelease, releaseMetadata } from './metadata.js'
export { codePaths, releaseOutputDir } from './layout.js'
