/**
 * On-disk file formats for relforge
 *
 * - relforge.toml: global config terms and release declarations
 * - world.json: discovered application packages
 */

/** Raw config term table, applied in key order */
export type ConfigTable = Record<string, unknown>

/** A `[[release]]` entry in relforge.toml */
export interface ReleaseFileEntry {
  name: string
  version: string
  runtime_version?: string | undefined
  /** Goal strings: `<name>` or `<name>@<version>` */
  goals?: string[] | undefined
  /** Loose per-application overrides */
  applications?: unknown[] | undefined
  exclude_apps?: string[] | undefined
  config?: ConfigTable | undefined
}

/** relforge.toml parsed to object */
export interface ReleaseFile {
  config?: ConfigTable | undefined
  release?: ReleaseFileEntry[] | undefined
}

/** A world.json entry */
export interface WorldFileEntry {
  name: string
  version: string
  applications?: string[] | undefined
  included_applications?: string[] | undefined
}

/** world.json parsed to object */
export type WorldFile = WorldFileEntry[]
