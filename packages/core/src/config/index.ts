/**
 * Config file parsers for relforge
 */

// Release configuration parser
export {
  createBuildState,
  fromReleaseFile,
  parseReleaseToml,
  readReleaseToml,
  RELEASE_CONFIG_FILENAME,
  toReleaseDraft,
} from './release-toml.js'
export type { ReleaseConfig } from './release-toml.js'

// World parser
export {
  fromWorldFile,
  parseWorldJson,
  readWorldJson,
  WORLD_FILENAME,
} from './world-json.js'
