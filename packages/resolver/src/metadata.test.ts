/**
 * Tests for release metadata and text rendering.
 */

import { describe, expect, test } from 'vitest'

import type { ResolvedRelease } from '@relforge/core'
import { ReleaseNotRealizedError, createReleaseDraft } from '@relforge/core'

import { formatRelease, releaseMetadata } from './metadata.js'

const release: ResolvedRelease = {
  ...createReleaseDraft('shop', '1.0.0', { runtimeVersion: '14.2' }),
  realized: true,
  appSpecs: [
    { name: 'shop_web', version: '1.0.0' },
    { name: 'sasl', version: '4.2', type: 'load' },
    { name: 'shop_db', version: '0.3.0', includedApplications: ['pool'] },
    { name: 'pool', version: '2.1', type: 'permanent', includedApplications: [] },
    { name: 'cache', version: ['x'], type: 'load', includedApplications: ['y'] },
  ],
  appDetail: [],
}

describe('releaseMetadata', () => {
  test('describes a resolved release', () => {
    expect(releaseMetadata(release)).toEqual({
      release: { name: 'shop', version: '1.0.0' },
      runtime: { name: 'erts', version: '14.2' },
      applications: [
        ['shop_web', '1.0.0'],
        ['sasl', '4.2', 'load'],
        ['shop_db', '0.3.0', ['pool']],
        ['pool', '2.1', 'permanent', []],
        ['cache', ['x'], 'load', ['y']],
      ],
    })
  })

  test('leaves the runtime version unset when the release has none', () => {
    const unset: ResolvedRelease = { ...release, runtimeVersion: undefined }
    expect(releaseMetadata(unset).runtime).toEqual({ name: 'erts', version: undefined })
  })

  test('refuses a release that was never realized', () => {
    expect(() => releaseMetadata(createReleaseDraft('shop', '1.0.0'))).toThrow(
      ReleaseNotRealizedError
    )
  })
})

describe('formatRelease', () => {
  test('renders one line per application', () => {
    expect(formatRelease(release)).toBe(
      [
        'release shop-1.0.0 (erts 14.2)',
        '  shop_web 1.0.0',
        '  sasl 4.2 load',
        '  shop_db 0.3.0 [pool]',
        '  pool 2.1 permanent []',
        '  cache [x] load [y]',
      ].join('\n')
    )
  })

  test('marks an unset runtime', () => {
    expect(formatRelease({ ...release, runtimeVersion: undefined, appSpecs: [] })).toBe(
      'release shop-1.0.0 (erts unset)'
    )
  })
})
