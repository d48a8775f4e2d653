/**
 * Runtime version realization.
 *
 * A release records the runtime version it runs on. The version comes from
 * the host, from configuration, or from a runtime installation directory
 * containing a single `erts-<version>` entry.
 */

import { existsSync, readdirSync } from 'node:fs'
import { join } from 'node:path'

import type { BuildState, ResolvedRelease } from '@relforge/core'
import { RuntimeDirError } from '@relforge/core'

/** Runtime name used in directory entries and release metadata */
export const RUNTIME_NAME = 'erts'

/** How the runtime version of a release is decided */
export type RuntimeSelector =
  | { kind: 'host' }
  | { kind: 'sentinel' }
  | { kind: 'directory'; dir: string }

/** Outcome of scanning a runtime directory */
export type RuntimeScanResult =
  | { found: true; version: string; path: string }
  | { found: false; reason: string }

/** Version string of the running host runtime */
export function hostRuntimeVersion(): string {
  return process.versions.node
}

/**
 * Map the build state's `include_erts` setting to a selector:
 * unset or `true` uses the host, `false` leaves the release as configured,
 * a string names a runtime directory.
 */
export function runtimeSelectorFromState(state: BuildState): RuntimeSelector {
  const includeErts = state.includeErts()
  if (typeof includeErts === 'string') {
    return { kind: 'directory', dir: includeErts }
  }
  return includeErts === false ? { kind: 'sentinel' } : { kind: 'host' }
}

/**
 * Look for the first `erts-<version>` entry directly under `dir`.
 * Never throws; every failure is reported in the result.
 */
export function scanRuntimeDir(dir: string): RuntimeScanResult {
  let entries: string[]
  try {
    entries = readdirSync(dir)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { found: false, reason: message }
  }

  const first = entries.filter((entry) => entry.startsWith(`${RUNTIME_NAME}-`)).sort()[0]
  if (!first) {
    return { found: false, reason: `no ${RUNTIME_NAME}-* entry in ${dir}` }
  }

  const parts = first.split('-').filter((part) => part.length > 0)
  const version = parts[1]
  if (parts.length !== 2 || !version) {
    return { found: false, reason: `malformed runtime entry "${first}"` }
  }

  return { found: true, version, path: join(dir, first) }
}

/**
 * Fix the runtime version of a resolved release.
 *
 * @param hostVersion - Version used by the `host` selector
 * @throws RuntimeDirError if a runtime directory holds no usable runtime
 */
export function realizeRuntime(
  release: ResolvedRelease,
  selector: RuntimeSelector,
  hostVersion: string = hostRuntimeVersion()
): ResolvedRelease {
  switch (selector.kind) {
    case 'host':
      return release.runtimeVersion === undefined
        ? { ...release, runtimeVersion: hostVersion }
        : release
    case 'sentinel':
      return release
    case 'directory': {
      const scan = scanRuntimeDir(selector.dir)
      if (!scan.found) {
        throw new RuntimeDirError(selector.dir, { cause: scan.reason })
      }
      return { ...release, runtimeVersion: scan.version }
    }
  }
}

/**
 * Operating system family the release targets: `win32` when the configured
 * runtime directory ships `bin/erl.exe`, the host platform otherwise.
 */
export function runtimeOsType(state: BuildState): NodeJS.Platform {
  const includeErts = state.includeErts()
  if (typeof includeErts === 'string' && existsSync(join(includeErts, 'bin', 'erl.exe'))) {
    return 'win32'
  }
  return process.platform
}
