/**
 * Preflight Command
 *
 * Wait for NiFi and check the credentials, nothing more.
 *
 * @purpose Verify NiFi reachability and authentication
 */

import ora from "ora"
import { loadConfigFrom } from "../utils/env-config.js"
import { createLogger } from "../lib/logger.js"
import { NifiClient } from "../lib/nifi-client.js"
import { waitUntilReady } from "../lib/readiness.js"
import { theme } from "../ui/theme.js"
import { reportFatal } from "./setup.js"

export interface PreflightCommandOptions {
  envFile?: string
  verbose?: boolean
}

export async function preflightCommand(options: PreflightCommandOptions = {}): Promise<void> {
  const logger = createLogger({ verbose: options.verbose })
  const spinner = ora("Waiting for NiFi to be ready...")

  try {
    const config = loadConfigFrom(options.envFile)
    const client = new NifiClient({
      baseUrl: config.nifi.baseUrl,
      dryRun: false,
      logger,
      timeoutMs: config.nifi.requestTimeoutMs,
      tlsVerify: config.nifi.tlsVerify,
    })

    spinner.start()
    const readiness = await waitUntilReady(() => client.probeReady(), {
      maxAttempts: config.readiness.maxAttempts,
      intervalMs: config.readiness.intervalMs,
      onAttempt: (attempt, max) => {
        spinner.text = `Waiting for NiFi to be ready... (attempt ${attempt}/${max})`
      },
    })
    spinner.succeed(
      readiness.status === "ready"
        ? `NiFi is ready at ${config.nifi.baseUrl} (${readiness.attempts} probe(s))`
        : "NiFi readiness check bypassed"
    )

    await client.authenticate({ username: config.nifi.username, password: config.nifi.password })
    logger.success(`Authenticated as ${config.nifi.username}`)
    console.log(theme.dim("Preflight passed"))
  } catch (error) {
    if (spinner.isSpinning) spinner.fail("Preflight failed")
    reportFatal(error, logger)
    process.exitCode = 1
  }
}
