/**
 * Tests for world (world.json) parser
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import { WORLD_FILENAME, parseWorldJson, readWorldJson } from './world-json.js'

const WORLD = [
  { name: 'kernel', version: '9.2' },
  {
    name: 'shop_web',
    version: '1.0.0',
    applications: ['kernel'],
    included_applications: ['shop_ui'],
  },
  { name: 'shop_ui', version: '1.0.0', applications: [] },
]

describe('parseWorldJson', () => {
  test('maps entries to application packages', () => {
    expect(parseWorldJson(JSON.stringify(WORLD))).toEqual([
      { name: 'kernel', version: '9.2', applications: [], includedApplications: [] },
      {
        name: 'shop_web',
        version: '1.0.0',
        applications: ['kernel'],
        includedApplications: ['shop_ui'],
      },
      { name: 'shop_ui', version: '1.0.0', applications: [], includedApplications: [] },
    ])
  })

  test('throws ConfigParseError on invalid JSON', () => {
    expect(() => parseWorldJson('[{', 'w.json')).toThrow(ConfigParseError)
  })

  test('throws ConfigValidationError on schema violations', () => {
    expect(() => parseWorldJson('[{"name": "kernel", "version": "9.2", "deps": []}]')).toThrow(
      'Invalid world.json:\n  /0: unknown property "deps"'
    )
  })

  test('rejects a world that is not a list', () => {
    expect(() => parseWorldJson('{}')).toThrow(ConfigValidationError)
  })
})

describe('readWorldJson', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relforge-world-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('reads a file from disk', async () => {
    const path = join(dir, WORLD_FILENAME)
    await writeFile(path, JSON.stringify(WORLD))
    expect(await readWorldJson(path)).toHaveLength(3)
  })

  test('reports a missing file', async () => {
    await expect(readWorldJson(join(dir, 'none.json'))).rejects.toThrow(ConfigParseError)
  })
})
