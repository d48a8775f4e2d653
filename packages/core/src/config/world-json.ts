/**
 * World (world.json) parser
 *
 * The world is produced by application discovery; this module only reads
 * and validates it.
 */

import { readFile } from 'node:fs/promises'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import { validateWorldFile } from '../schemas/index.js'
import type { AppInfo } from '../types/app.js'
import type { WorldFile, WorldFileEntry } from '../types/files.js'

/** Default filename for the world description */
export const WORLD_FILENAME = 'world.json'

function toAppInfo(entry: WorldFileEntry): AppInfo {
  return {
    name: entry.name,
    version: entry.version,
    applications: entry.applications ?? [],
    includedApplications: entry.included_applications ?? [],
  }
}

/** Convert a validated world file into application packages */
export function fromWorldFile(file: WorldFile): AppInfo[] {
  return file.map(toAppInfo)
}

/**
 * Parse world.json content into application packages
 *
 * @param content - Raw JSON string content
 * @param filePath - Path to the file (for error messages)
 * @throws ConfigParseError if JSON parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseWorldJson(content: string, filePath?: string): AppInfo[] {
  const source = filePath ?? WORLD_FILENAME

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse JSON: ${message}`, source)
  }

  const result = validateWorldFile(parsed)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${WORLD_FILENAME}`, source, result.errors)
  }

  return fromWorldFile(result.data)
}

/**
 * Read and parse a world.json file from disk
 */
export async function readWorldJson(filePath: string): Promise<AppInfo[]> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
      throw new ConfigParseError('File not found', filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
  return parseWorldJson(content, filePath)
}
