/**
 * Tests for application override parsing.
 *
 * WHY: Overrides arrive from configuration in several loose forms. Every
 * accepted form must map to exactly one override case, and every other
 * shape must be rejected before resolution starts.
 */

import { describe, expect, test } from 'vitest'

import { InvalidOverrideShapeError } from '../errors.js'
import { formatSpecVersion, parseAppOverride, parseAppOverrides, toSpecTuple } from './overrides.js'

describe('parseAppOverride', () => {
  describe('strings', () => {
    test('bare name', () => {
      expect(parseAppOverride('sasl')).toEqual({ kind: 'name', name: 'sasl' })
    })

    test('rejects an invalid name', () => {
      expect(() => parseAppOverride('Sasl')).toThrow(InvalidOverrideShapeError)
    })
  })

  describe('tuples', () => {
    test('name and start type', () => {
      expect(parseAppOverride(['sasl', 'load'])).toEqual({
        kind: 'type',
        name: 'sasl',
        type: 'load',
      })
    })

    test('name and version', () => {
      expect(parseAppOverride(['sasl', '4.2'])).toEqual({
        kind: 'version',
        name: 'sasl',
        version: '4.2',
      })
    })

    test('name and included applications', () => {
      expect(parseAppOverride(['web', ['cowboy', 'ranch']])).toEqual({
        kind: 'included',
        name: 'web',
        includedApplications: ['cowboy', 'ranch'],
      })
    })

    test('name and empty included list', () => {
      expect(parseAppOverride(['web', []])).toEqual({
        kind: 'included',
        name: 'web',
        includedApplications: [],
      })
    })

    test('name, version and start type', () => {
      expect(parseAppOverride(['db', '0.3.0', 'transient'])).toEqual({
        kind: 'version-type',
        name: 'db',
        version: '0.3.0',
        type: 'transient',
      })
    })

    test('name, version, start type and included applications', () => {
      expect(parseAppOverride(['db', '0.3.0', 'permanent', ['pool']])).toEqual({
        kind: 'full',
        name: 'db',
        version: '0.3.0',
        type: 'permanent',
        includedApplications: ['pool'],
      })
    })

    test('included list in the version slot of a four-element tuple', () => {
      expect(parseAppOverride(['app', ['x'], 'load', ['y']])).toEqual({
        kind: 'full',
        name: 'app',
        version: ['x'],
        type: 'load',
        includedApplications: ['y'],
      })
    })

    test('rejects an included list in the version slot of a three-element tuple', () => {
      expect(() => parseAppOverride(['app', ['x'], 'load'])).toThrow(InvalidOverrideShapeError)
    })

    test('rejects a start type in the version slot', () => {
      expect(() => parseAppOverride(['db', 'load', 'transient'])).toThrow(
        'Invalid application override for db: unrecognized override ["db","load","transient"]'
      )
    })

    test('rejects an unknown start type', () => {
      expect(() => parseAppOverride(['db', '1.0', 'lazy'])).toThrow(InvalidOverrideShapeError)
    })

    test('rejects a one-element tuple', () => {
      expect(() => parseAppOverride(['db'])).toThrow(InvalidOverrideShapeError)
    })

    test('rejects a five-element tuple', () => {
      expect(() => parseAppOverride(['db', '1.0', 'load', [], 'x'])).toThrow(
        InvalidOverrideShapeError
      )
    })

    test('rejects a tuple without a leading name', () => {
      expect(() => parseAppOverride([1, 'load'])).toThrow(
        'Invalid application override for <unnamed>: expected an application name first in [1,"load"]'
      )
    })
  })

  describe('tables', () => {
    test('name only', () => {
      expect(parseAppOverride({ name: 'sasl' })).toEqual({ kind: 'name', name: 'sasl' })
    })

    test('name and type', () => {
      expect(parseAppOverride({ name: 'sasl', type: 'none' })).toEqual({
        kind: 'type',
        name: 'sasl',
        type: 'none',
      })
    })

    test('name and version', () => {
      expect(parseAppOverride({ name: 'sasl', version: '4.2' })).toEqual({
        kind: 'version',
        name: 'sasl',
        version: '4.2',
      })
    })

    test('name and included applications', () => {
      expect(parseAppOverride({ name: 'web', included_applications: ['ranch'] })).toEqual({
        kind: 'included',
        name: 'web',
        includedApplications: ['ranch'],
      })
    })

    test('version and type', () => {
      expect(parseAppOverride({ name: 'db', version: '0.3.0', type: 'temporary' })).toEqual({
        kind: 'version-type',
        name: 'db',
        version: '0.3.0',
        type: 'temporary',
      })
    })

    test('all fields', () => {
      expect(
        parseAppOverride({
          name: 'db',
          version: '0.3.0',
          type: 'transient',
          included_applications: [],
        })
      ).toEqual({
        kind: 'full',
        name: 'db',
        version: '0.3.0',
        type: 'transient',
        includedApplications: [],
      })
    })

    test('rejects included applications without both version and type', () => {
      expect(() =>
        parseAppOverride({ name: 'db', version: '0.3.0', included_applications: [] })
      ).toThrow(
        'Invalid application override for db: included_applications can only be combined with both a version and a type'
      )
      expect(() =>
        parseAppOverride({ name: 'db', type: 'load', included_applications: [] })
      ).toThrow(InvalidOverrideShapeError)
    })

    test('rejects unknown keys', () => {
      expect(() => parseAppOverride({ name: 'db', start: 'load' })).toThrow(
        'Invalid application override for db: unknown property "start"'
      )
    })

    test('rejects a wrongly typed field', () => {
      expect(() => parseAppOverride({ name: 'db', type: 'lazy' })).toThrow(
        'Invalid application override for db: type must be a start type, got "lazy"'
      )
    })

    test('rejects a table without a name', () => {
      expect(() => parseAppOverride({ version: '1.0' })).toThrow(InvalidOverrideShapeError)
    })
  })

  test('rejects other values', () => {
    expect(() => parseAppOverride(42)).toThrow(
      'Invalid application override for <unnamed>: unrecognized override 42'
    )
    expect(() => parseAppOverride(null)).toThrow(InvalidOverrideShapeError)
  })
})

describe('parseAppOverrides', () => {
  test('keeps entry order, including repeated names', () => {
    const overrides = parseAppOverrides(['sasl', ['sasl', 'load']])
    expect(overrides.map((o) => o.kind)).toEqual(['name', 'type'])
  })
})

describe('formatSpecVersion', () => {
  test('a version as-is and an included list in brackets', () => {
    expect(formatSpecVersion('1.0')).toBe('1.0')
    expect(formatSpecVersion(['x', 'y'])).toBe('[x, y]')
  })
})

describe('toSpecTuple', () => {
  test('name and version only', () => {
    expect(toSpecTuple({ name: 'kernel', version: '9.2' })).toEqual(['kernel', '9.2'])
  })

  test('with type', () => {
    expect(toSpecTuple({ name: 'sasl', version: '4.2', type: 'load' })).toEqual([
      'sasl',
      '4.2',
      'load',
    ])
  })

  test('with included applications', () => {
    expect(toSpecTuple({ name: 'web', version: '1.0', includedApplications: ['ranch'] })).toEqual([
      'web',
      '1.0',
      ['ranch'],
    ])
  })

  test('type before included applications', () => {
    expect(
      toSpecTuple({ name: 'web', version: '1.0', type: 'permanent', includedApplications: [] })
    ).toEqual(['web', '1.0', 'permanent', []])
  })
})
