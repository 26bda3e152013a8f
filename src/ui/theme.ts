/**
 * Terminal theme
 * Consistent colors and symbols across the CLI
 */

import chalk from "chalk"

// ============================================================================
// COLOR PALETTE
// ============================================================================

export const colors = {
  accent: "#4FC3F7",
  text: "#F5F5F5",
  dim: "#888888",

  success: "#00FF88",
  error: "#FF4444",
  warning: "#FFAA00",
  info: "#F0C987",

  // Dry-run lines stand out from real actions
  dryRun: "#7B9CFF",
}

// ============================================================================
// THEME HELPERS
// ============================================================================

export const theme = {
  text: (s: string) => chalk.hex(colors.text)(s),
  dim: (s: string) => chalk.hex(colors.dim)(s),
  accent: (s: string) => chalk.hex(colors.accent)(s),
  accentBold: (s: string) => chalk.hex(colors.accent).bold(s),

  success: (s: string) => chalk.hex(colors.success)(s),
  error: (s: string) => chalk.hex(colors.error)(s),
  warning: (s: string) => chalk.hex(colors.warning)(s),
  info: (s: string) => chalk.hex(colors.info)(s),
  dryRun: (s: string) => chalk.hex(colors.dryRun)(s),

  bold: chalk.bold,
}

export const symbols = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "•",
  arrow: "→",
  line: "─",
}

// Horizontal rule
export function hr(width = 40): string {
  return theme.dim(symbols.line.repeat(width))
}
