/**
 * Terminal logger for the relforge CLI.
 *
 * WHY: Library packages log through the Logger interface and stay silent by
 * default. The CLI supplies this implementation so progress goes to stderr
 * and stdout carries only command output (text or JSON).
 */

import type { LogLevel, Logger } from '@relforge/core'
import { shouldLog } from '@relforge/core'

import { colors, symbols } from './ui.js'

export interface CliLoggerOptions {
  /** Print debug lines */
  verbose?: boolean | undefined
  /** Line sink (default: stderr) */
  write?: ((line: string) => void) | undefined
}

/**
 * True when verbose output was requested by flag or by RELFORGE_VERBOSE.
 */
export function isVerbose(
  flag: boolean | undefined,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (flag) return true
  const value = env['RELFORGE_VERBOSE']
  return value === '1' || value === 'true'
}

function decorate(level: LogLevel, message: string): string {
  switch (level) {
    case 'debug':
      return colors.dim(message)
    case 'info':
      return `${symbols.info} ${message}`
    case 'warn':
      return `${symbols.warning} ${colors.warn(message)}`
    case 'error':
      return `${symbols.error} ${colors.error(message)}`
  }
}

/**
 * Create a logger that writes decorated lines. Debug lines are dropped
 * unless verbose.
 */
export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  const threshold: LogLevel = options.verbose ? 'debug' : 'info'
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`))

  const log = (level: LogLevel) => (message: string) => {
    if (!shouldLog(level, threshold)) return
    for (const line of message.split('\n')) {
      write(decorate(level, line))
    }
  }

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  }
}
