/**
 * Setup Runner
 *
 * One provisioning run, start to finish:
 * topology -> readiness gate -> authenticate -> database preflight -> converge.
 *
 * Fatal errors (readiness timeout, authentication, missing table, invalid
 * topology) propagate. Per-resource failures end up in the report.
 *
 * @purpose Orchestrate a full NiFi topology provisioning run
 */

import type { AxiosAdapter } from "axios"
import type { TopologySpec } from "../types/topology.js"
import type { AppConfig } from "../utils/env-config.js"
import type { Logger } from "./logger.js"
import { NifiClient } from "./nifi-client.js"
import { type ReadinessResult, waitUntilReady } from "./readiness.js"
import { type ConvergenceReport, ConvergenceEngine } from "./convergence.js"
import { type DatabaseProbe, type DbPreflightResult, PgDatabaseProbe, runDbPreflight } from "./db-preflight.js"
import { buildPlan, loadTopology } from "./topology-loader.js"

export type SetupPhase = "readiness" | "authenticate" | "database" | "converge"

export interface SetupOptions {
  /** Built-in name (`cdc`, `outbox`) or a path to a topology file. */
  topology: string
  dryRun: boolean
  skipDbCheck?: boolean
  createSlot?: boolean
}

export interface SetupDependencies {
  config: AppConfig
  logger: Logger
  adapter?: AxiosAdapter
  openDatabase?: (config: AppConfig) => DatabaseProbe
  sleep?: (ms: number) => Promise<void>
  onPhase?: (phase: SetupPhase) => void
  onReadinessAttempt?: (attempt: number, maxAttempts: number) => void
}

export type DatabaseOutcome = DbPreflightResult | { status: "skipped"; reason: string }

export interface SetupResult {
  topology: TopologySpec
  readiness: ReadinessResult
  database: DatabaseOutcome
  report: ConvergenceReport
}

export async function runSetup(options: SetupOptions, deps: SetupDependencies): Promise<SetupResult> {
  const { config, logger } = deps

  const topology = loadTopology(options.topology, { config })
  const plan = buildPlan(topology)
  logger.debug(`Loaded topology '${topology.name}' with ${plan.steps.length} steps`)

  const client = new NifiClient({
    baseUrl: config.nifi.baseUrl,
    dryRun: options.dryRun,
    logger,
    timeoutMs: config.nifi.requestTimeoutMs,
    tlsVerify: config.nifi.tlsVerify,
    adapter: deps.adapter,
  })

  deps.onPhase?.("readiness")
  const readiness = await waitUntilReady(() => client.probeReady(), {
    maxAttempts: config.readiness.maxAttempts,
    intervalMs: config.readiness.intervalMs,
    bypass: options.dryRun,
    sleep: deps.sleep,
    onAttempt: deps.onReadinessAttempt,
  })
  if (readiness.status === "bypassed") {
    logger.dryRun("Skipping readiness check")
  } else {
    logger.success(`NiFi is ready (${readiness.attempts} probe(s))`)
  }

  deps.onPhase?.("authenticate")
  await client.authenticate({ username: config.nifi.username, password: config.nifi.password })
  if (!options.dryRun) logger.success("Authenticated")

  deps.onPhase?.("database")
  const database = await checkDatabase(topology, options, deps)

  deps.onPhase?.("converge")
  const engine = new ConvergenceEngine(client, logger, {
    retry: {
      maxAttempts: config.retry.maxAttempts,
      delayMs: config.retry.delayMs,
      sleep: deps.sleep,
    },
  })
  const report = await engine.converge(plan)

  return { topology, readiness, database, report }
}

async function checkDatabase(
  topology: TopologySpec,
  options: SetupOptions,
  deps: SetupDependencies
): Promise<DatabaseOutcome> {
  const { preflight } = topology
  if (preflight.tables.length === 0 && !preflight.replicationSlot) {
    return { status: "skipped", reason: "no database prerequisites" }
  }
  if (options.dryRun) {
    deps.logger.dryRun("Skipping database checks")
    return { status: "skipped", reason: "dry run" }
  }
  if (options.skipDbCheck) {
    deps.logger.info("Skipping database checks (--skip-db-check)")
    return { status: "skipped", reason: "disabled" }
  }

  const open = deps.openDatabase ?? ((config: AppConfig) => new PgDatabaseProbe(config.postgres))
  return runDbPreflight(preflight, open(deps.config), deps.logger, { createSlot: options.createSlot })
}
