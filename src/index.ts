#!/usr/bin/env node
/**
 * flowprov - NiFi flow provisioner
 *
 * Idempotently provisions CDC and Outbox topologies on Apache NiFi over its
 * REST API, with a dry-run mode that walks the same decisions offline.
 */

import { Command } from "commander"
import chalk from "chalk"
import { type SetupCommandOptions, setupCommand } from "./commands/setup.js"
import { type PlanCommandOptions, planCommand } from "./commands/plan.js"
import { type PreflightCommandOptions, preflightCommand } from "./commands/preflight.js"
import { BUILTIN_TOPOLOGIES } from "./lib/topology-loader.js"

const program = new Command()

program
  .name("flowprov")
  .description("Provision NiFi CDC and Outbox flows idempotently")
  .version("0.1.0")

const topologyHelp = `built-in topology (${BUILTIN_TOPOLOGIES.join(", ")}) or path to a YAML file`

program
  .command("setup")
  .description("Create or converge a topology on NiFi")
  .argument("<topology>", topologyHelp)
  .option("-n, --dry-run", "Show what would be created without touching NiFi")
  .option("-v, --verbose", "Print request-level debug output")
  .option("--env-file <path>", "Environment file to load (default: .env)")
  .option("--skip-db-check", "Skip PostgreSQL table and replication slot checks")
  .option("--create-slot", "Create the logical replication slot if it is missing")
  .action(async (topology: string, options: SetupCommandOptions) => {
    await setupCommand(topology, options)
  })

program
  .command("plan")
  .description("Validate a topology and print the provisioning order (offline)")
  .argument("<topology>", topologyHelp)
  .option("--env-file <path>", "Fill { setting } values from this environment file")
  .option("-v, --verbose", "Print debug output")
  .action(async (topology: string, options: PlanCommandOptions) => {
    await planCommand(topology, options)
  })

program
  .command("preflight")
  .description("Wait for NiFi and verify the configured credentials")
  .option("--env-file <path>", "Environment file to load (default: .env)")
  .option("-v, --verbose", "Print request-level debug output")
  .action(async (options: PreflightCommandOptions) => {
    await preflightCommand(options)
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)))
  process.exitCode = 1
})
