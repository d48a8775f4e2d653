/**
 * @relforge/cli - Library exports for the relforge CLI.
 *
 * WHY: Separates library exports from CLI execution to allow
 * testing without running the CLI.
 */

export { createProgram, formatCliError } from './index.js'
export {
  ConfigNotFoundError,
  findConfigFile,
  getConfigPath,
  getWorldPath,
  loadReleaseContext,
  locateWorldPath,
} from './helpers.js'
export type { CommonOptions, ReleaseContext } from './helpers.js'
export { createCliLogger, isVerbose } from './logger.js'
export type { CliLoggerOptions } from './logger.js'
export { buildResolveOutput, renderResolveText } from './commands/resolve.js'
export type { ResolveOutput } from './commands/resolve.js'
export { buildListOutput, renderListText } from './commands/list.js'
export type { ListOutput, ListedRelease } from './commands/list.js'
export { buildWorldOutput, renderWorldText } from './commands/world.js'
export type { ListedApp } from './commands/world.js'
