/**
 * Leveled logger
 *
 * Lines go through a sink so the CLI can color them and tests can capture
 * them as plain text. `debug` is dropped unless verbose.
 *
 * @purpose Operator-facing output for every provisioning step
 */

import { theme, symbols } from "../ui/theme.js"

export type LogLevel = "debug" | "info" | "success" | "warn" | "error"

export type LogSink = (level: LogLevel, message: string) => void

export interface Logger {
  debug(message: string): void
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  /** Intended mutation in dry-run mode. */
  dryRun(message: string): void
  readonly verbose: boolean
}

export const DRY_RUN_PREFIX = "[DRY RUN]"

export function consoleSink(level: LogLevel, message: string): void {
  switch (level) {
    case "debug":
      console.log(theme.dim(message))
      break
    case "info":
      console.log(message.startsWith(DRY_RUN_PREFIX) ? theme.dryRun(message) : theme.info(message))
      break
    case "success":
      console.log(theme.success(`${symbols.success} ${message}`))
      break
    case "warn":
      console.error(theme.warning(`${symbols.warning} ${message}`))
      break
    case "error":
      console.error(theme.error(`${symbols.error} ${message}`))
      break
  }
}

export function createLogger(options: { verbose?: boolean; sink?: LogSink } = {}): Logger {
  const verbose = options.verbose ?? false
  const sink = options.sink ?? consoleSink

  return {
    verbose,
    debug: (message) => {
      if (verbose) sink("debug", message)
    },
    info: (message) => sink("info", message),
    success: (message) => sink("success", message),
    warn: (message) => sink("warn", message),
    error: (message) => sink("error", message),
    dryRun: (message) => sink("info", `${DRY_RUN_PREFIX} ${message}`),
  }
}

/** Collects lines in memory instead of printing them. */
export function createMemoryLogger(options: { verbose?: boolean } = {}): Logger & {
  lines: Array<{ level: LogLevel; message: string }>
} {
  const lines: Array<{ level: LogLevel; message: string }> = []
  const logger = createLogger({
    verbose: options.verbose,
    sink: (level, message) => lines.push({ level, message }),
  })
  return Object.assign(logger, { lines })
}
