/**
 * Tests for resolve command output.
 */

import { join } from 'node:path'
import { stripVTControlCharacters } from 'node:util'
import figures from 'figures'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { createReleaseDraft } from '@relforge/core'
import { resolveRelease } from '@relforge/resolver'

import { buildResolveOutput, renderResolveText } from './resolve.js'

const world = [
  { name: 'kernel', version: '1.0', applications: [], includedApplications: [] },
  { name: 'myapp', version: '2.0', applications: ['kernel'], includedApplications: [] },
]

const { release } = resolveRelease(
  createReleaseDraft('shop', '1.0.0', {
    goals: new Map<string, string | undefined>([['myapp', undefined]]),
  }),
  { world, hostRuntimeVersion: '20.11.0' }
)

describe('buildResolveOutput', () => {
  test('is the release metadata without an output directory', () => {
    expect(buildResolveOutput(release)).toEqual({
      release: { name: 'shop', version: '1.0.0' },
      runtime: { name: 'erts', version: '20.11.0' },
      applications: [
        ['myapp', '2.0'],
        ['kernel', '1.0'],
      ],
    })
  })

  test('adds the layout under an output directory', () => {
    expect(buildResolveOutput(release, '/out').layout).toEqual({
      releaseDir: join('/out', 'shop', 'releases', '1.0.0'),
      codePaths: [
        join('/out', 'lib', 'myapp-2.0', 'ebin'),
        join('/out', 'lib', 'kernel-1.0', 'ebin'),
      ],
    })
  })
})

describe('renderResolveText', () => {
  beforeEach(() => {
    vi.stubEnv('HOME', '/home/tester')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  test('lists applications in start order with their dependents', () => {
    const lines = renderResolveText(release).map((line) => stripVTControlCharacters(line))
    expect(lines).toEqual([
      `${figures.tick} shop-1.0.0`,
      '  runtime      20.11.0',
      '  applications 2',
      '',
      '  ├─ myapp 2.0',
      `  └─ kernel 1.0 ${figures.arrowRight} myapp`,
    ])
  })

  test('shows the release directory and code paths', () => {
    const lines = renderResolveText(release, '/out').map((line) => stripVTControlCharacters(line))
    expect(lines.slice(6)).toEqual([
      '',
      `  release dir  ${join('/out', 'shop', 'releases', '1.0.0')}`,
      `    ${join('/out', 'lib', 'myapp-2.0', 'ebin')}`,
      `    ${join('/out', 'lib', 'kernel-1.0', 'ebin')}`,
    ])
  })
})
