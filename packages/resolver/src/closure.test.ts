/**
 * Tests for application closure computation.
 *
 * WHY: Discovery order becomes start order, so the exact order of the
 * closure is observable. These tests pin down the append-queue walk,
 * de-duplication and missing-application failures.
 */

import { describe, expect, test } from 'vitest'

import type { AppInfo } from '@relforge/core'
import { AppNotFoundError } from '@relforge/core'

import { computeClosure, findApp, getDependents, worldIncludedApps } from './closure.js'

function app(
  name: string,
  version: string,
  applications: string[] = [],
  includedApplications: string[] = []
): AppInfo {
  return { name, version, applications, includedApplications }
}

const names = (apps: readonly AppInfo[]) => apps.map((a) => a.name)

describe('findApp', () => {
  const world = [app('kernel', '9.1'), app('kernel', '9.2'), app('sasl', '4.2')]

  test('matches the first entry by name when no version is pinned', () => {
    expect(findApp(world, { name: 'kernel' })?.version).toBe('9.1')
  })

  test('matches name and version when pinned', () => {
    expect(findApp(world, { name: 'kernel', version: '9.2' })?.version).toBe('9.2')
  })

  test('returns undefined when nothing matches', () => {
    expect(findApp(world, { name: 'kernel', version: '8.0' })).toBeUndefined()
    expect(findApp(world, { name: 'stdlib' })).toBeUndefined()
  })
})

describe('computeClosure', () => {
  test('resolves a goal and its dependency', () => {
    const world = [app('kernel', '1.0'), app('myapp', '2.0', ['kernel'])]
    expect(computeClosure([{ name: 'myapp' }], world)).toEqual([
      app('myapp', '2.0', ['kernel']),
      app('kernel', '1.0'),
    ])
  })

  test('queues siblings before dependencies of later discoveries', () => {
    const world = [app('a', '1', ['c']), app('b', '1', ['d']), app('c', '1'), app('d', '1')]
    expect(names(computeClosure([{ name: 'a' }, { name: 'b' }], world))).toEqual([
      'a',
      'b',
      'c',
      'd',
    ])
  })

  test('queues dependencies before included applications', () => {
    const world = [
      app('web', '1', ['kernel'], ['ui']),
      app('ui', '1', ['stdlib']),
      app('kernel', '1'),
      app('stdlib', '1'),
    ]
    expect(names(computeClosure([{ name: 'web' }], world))).toEqual([
      'web',
      'kernel',
      'ui',
      'stdlib',
    ])
  })

  test('lists each application once', () => {
    const world = [
      app('a', '1', ['kernel', 'b']),
      app('b', '1', ['kernel']),
      app('kernel', '1'),
    ]
    expect(names(computeClosure([{ name: 'a' }, { name: 'kernel' }], world))).toEqual([
      'a',
      'kernel',
      'b',
    ])
  })

  test('terminates on dependency cycles', () => {
    const world = [app('a', '1', ['b']), app('b', '1', ['a'])]
    expect(names(computeClosure([{ name: 'a' }], world))).toEqual(['a', 'b'])
  })

  test('honours pinned goal versions', () => {
    const world = [app('kernel', '9.1'), app('kernel', '9.2')]
    expect(computeClosure([{ name: 'kernel', version: '9.2' }], world)).toEqual([
      app('kernel', '9.2'),
    ])
  })

  test('fails on a missing goal', () => {
    expect(() => computeClosure([{ name: 'missing' }], [app('kernel', '1')])).toThrow(
      new AppNotFoundError('missing')
    )
  })

  test('fails on a missing dependency', () => {
    const world = [app('myapp', '1', ['ghost'])]
    expect(() => computeClosure([{ name: 'myapp' }], world)).toThrow(
      'Application needed for release not found: ghost'
    )
  })

  test('returns nothing for no goals', () => {
    expect(computeClosure([], [app('kernel', '1')])).toEqual([])
  })
})

describe('worldIncludedApps', () => {
  test('collects included names from every package in the world', () => {
    const world = [
      app('web', '1', [], ['ui', 'assets']),
      app('admin', '1', [], ['ui']),
      app('ui', '1'),
    ]
    expect([...worldIncludedApps(world)].sort()).toEqual(['assets', 'ui'])
  })
})

describe('getDependents', () => {
  test('finds applications that depend on or include a name', () => {
    const resolved = [
      app('web', '1', ['kernel'], ['ui']),
      app('ui', '1', ['kernel']),
      app('kernel', '1'),
    ]
    expect(names(getDependents(resolved, 'kernel'))).toEqual(['web', 'ui'])
    expect(names(getDependents(resolved, 'ui'))).toEqual(['web'])
    expect(getDependents(resolved, 'web')).toEqual([])
  })
})
