/**
 * Release metadata and text rendering.
 */

import type { Release, ReleaseMetadata, ResolvedRelease } from '@relforge/core'
import {
  ReleaseNotRealizedError,
  formatSpecVersion,
  isResolvedRelease,
  toSpecTuple,
} from '@relforge/core'

import { RUNTIME_NAME } from './runtime.js'

/**
 * Produce the metadata a serializer writes out for a release.
 *
 * @throws ReleaseNotRealizedError if the release was never resolved
 */
export function releaseMetadata(release: Release): ReleaseMetadata {
  if (!isResolvedRelease(release)) {
    throw new ReleaseNotRealizedError(release.name, release.version)
  }
  return {
    release: { name: release.name, version: release.version },
    runtime: { name: RUNTIME_NAME, version: release.runtimeVersion },
    applications: release.appSpecs.map(toSpecTuple),
  }
}

/**
 * Render a resolved release as plain text, one application per line.
 */
export function formatRelease(release: ResolvedRelease): string {
  const runtime = release.runtimeVersion ?? 'unset'
  const lines = [`release ${release.name}-${release.version} (${RUNTIME_NAME} ${runtime})`]
  for (const spec of release.appSpecs) {
    const parts = [spec.name, formatSpecVersion(spec.version)]
    if (spec.type) {
      parts.push(spec.type)
    }
    if (spec.includedApplications) {
      parts.push(`[${spec.includedApplications.join(', ')}]`)
    }
    lines.push(`  ${parts.join(' ')}`)
  }
  return lines.join('\n')
}
