/**
 * Setup Command
 *
 * Provision a topology on NiFi. Safe to re-run: existing resources are
 * reused and their configuration re-applied.
 *
 * @purpose CLI entry for idempotent topology provisioning (real or dry run)
 */

import ora, { type Ora } from "ora"
import { loadConfigFrom } from "../utils/env-config.js"
import { type Logger, createLogger } from "../lib/logger.js"
import { type SetupResult, runSetup } from "../lib/setup-runner.js"
import { HttpResponseError, ProvisionError, describeError } from "../lib/errors.js"
import { theme, hr } from "../ui/theme.js"

export interface SetupCommandOptions {
  dryRun?: boolean
  verbose?: boolean
  envFile?: string
  skipDbCheck?: boolean
  createSlot?: boolean
}

export async function setupCommand(topology: string, options: SetupCommandOptions = {}): Promise<void> {
  const dryRun = options.dryRun ?? false
  const logger = createLogger({ verbose: options.verbose })
  let spinner: Ora | null = null

  const stopSpinner = (ok: boolean) => {
    if (!spinner) return
    if (ok) spinner.succeed("NiFi is reachable")
    else spinner.fail("NiFi did not become ready")
    spinner = null
  }

  console.log()
  console.log(theme.accentBold(`NiFi topology setup: ${topology}`))
  if (dryRun) {
    console.log(theme.dryRun("DRY RUN: no changes will be made"))
  }
  console.log(hr())

  try {
    const config = loadConfigFrom(options.envFile)

    const result = await runSetup(
      {
        topology,
        dryRun,
        skipDbCheck: options.skipDbCheck,
        createSlot: options.createSlot,
      },
      {
        config,
        logger,
        onPhase: (phase) => {
          if (phase === "readiness" && !dryRun) {
            spinner = ora("Waiting for NiFi to be ready...").start()
          } else {
            stopSpinner(true)
          }
        },
        onReadinessAttempt: (attempt, max) => {
          if (spinner) spinner.text = `Waiting for NiFi to be ready... (attempt ${attempt}/${max})`
        },
      }
    )

    printSummary(result, logger)
    if (!result.report.ok) {
      process.exitCode = 1
    }
  } catch (error) {
    stopSpinner(false)
    reportFatal(error, logger)
    process.exitCode = 1
  }
}

// ============================================================================
// Output
// ============================================================================

function printSummary(result: SetupResult, logger: Logger): void {
  const { report, topology } = result
  const { counts } = report

  console.log()
  console.log(hr())
  console.log(theme.bold(report.dryRun ? "Dry run complete" : "Setup complete"))
  console.log(
    theme.dim(
      `  created ${counts.created}, reused ${counts.reused}, configured ${counts.configured}, ` +
        `skipped ${counts.skipped}, failed ${counts.failed}`
    )
  )

  if (!report.ok) {
    logger.error(`${counts.failed + counts.skipped} resource(s) in '${topology.name}' did not converge`)
    for (const decision of report.decisions) {
      if (decision.action === "fail" || decision.action === "skip") {
        console.log(theme.dim(`  ${decision.action}: ${decision.kind} '${decision.name}'`))
      }
    }
    return
  }

  if (topology.nextSteps.length > 0) {
    console.log()
    console.log(theme.bold("Next steps:"))
    topology.nextSteps.forEach((step, index) => {
      console.log(theme.text(`  ${index + 1}. ${step}`))
    })
  }
  console.log()
}

export function reportFatal(error: unknown, logger: Logger): void {
  if (error instanceof ProvisionError) {
    logger.error(`[${error.code}] ${error.message}`)
  } else {
    logger.error(describeError(error))
  }
  if (error instanceof HttpResponseError) {
    if (error.body) logger.error(`  Response body: ${error.body}`)
    for (const message of error.validationErrors) {
      logger.error(`  - ${message}`)
    }
  }
}
