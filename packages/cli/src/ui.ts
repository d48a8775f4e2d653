/**
 * Terminal UI utilities for the relforge CLI.
 *
 * Design: Refined industrial aesthetic
 * - Clean lines, purposeful spacing
 * - Unicode symbols for visual hierarchy
 * - Sparse, meaningful color
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette - Muted, purposeful colors
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  // Success
  success: chalk.hex('#10b981'), // emerald
  // Informational, neutral
  info: chalk.hex('#6366f1'), // indigo
  // Warnings
  warn: chalk.hex('#f59e0b'), // amber
  // Errors
  error: chalk.hex('#ef4444'), // red
  // Muted/secondary text
  muted: chalk.hex('#6b7280'), // gray-500
  // Emphasized text
  emphasis: chalk.hex('#f3f4f6'), // gray-100
  // Application names and versions
  code: chalk.hex('#a78bfa'), // violet-400
  // Dim for less important info
  dim: chalk.hex('#4b5563'), // gray-600
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbols - Consistent iconography
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  warning: colors.warn(figures.warning),
  info: colors.info(figures.info),
  bullet: colors.muted(figures.bullet),
  arrow: colors.muted(figures.arrowRight),
  corner: colors.dim('└'),
  tee: colors.dim('├'),
  dash: colors.dim('─'),
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner - Progress indication
// ═══════════════════════════════════════════════════════════════════════════

export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
    stream: process.stderr,
  })
}

// ═══════════════════════════════════════════════════════════════════════════
// Line builders
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A labelled value, indented under a header
 */
export function infoLine(label: string, value: string): string {
  return `  ${colors.muted(label.padEnd(12))} ${value}`
}

/**
 * A tree item (for hierarchical display)
 */
export function treeLine(text: string, isLast = false): string {
  const prefix = isLast ? symbols.corner : symbols.tee
  return `  ${prefix}${symbols.dash} ${text}`
}

/**
 * Tree items for a list, marking the last one
 */
export function treeLines(items: readonly string[]): string[] {
  return items.map((item, index) => treeLine(item, index === items.length - 1))
}

// ═══════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a file path for display (shorten home dir)
 */
export function formatPath(filePath: string): string {
  const home = process.env['HOME'] ?? ''
  if (home) {
    return filePath.replaceAll(home, '~')
  }
  return filePath
}

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  return `${(ms / 1000).toFixed(1)}s`
}
