/**
 * Plan Command
 *
 * Load and validate a topology, then print the ordered steps a setup run
 * would take. Touches neither NiFi nor the database.
 *
 * @purpose Offline preview of a topology's provisioning order
 */

import type { PlanStep, TopologyPlan } from "../types/topology.js"
import { loadConfigFrom } from "../utils/env-config.js"
import { createLogger } from "../lib/logger.js"
import { describeStep } from "../lib/convergence.js"
import { buildPlan, loadTopology } from "../lib/topology-loader.js"
import { theme, hr } from "../ui/theme.js"
import { reportFatal } from "./setup.js"

export interface PlanCommandOptions {
  envFile?: string
  verbose?: boolean
}

export async function planCommand(topology: string, options: PlanCommandOptions = {}): Promise<void> {
  const logger = createLogger({ verbose: options.verbose })

  try {
    // Settings only fill in when an env file is given
    const config = options.envFile ? loadConfigFrom(options.envFile) : undefined
    const spec = loadTopology(topology, { config })
    const plan = buildPlan(spec)

    console.log()
    console.log(theme.accentBold(`Plan: ${spec.name}`))
    if (spec.description) console.log(theme.dim(spec.description))
    console.log(hr())
    console.log(formatPlan(plan).join("\n"))
    console.log()
  } catch (error) {
    reportFatal(error, logger)
    process.exitCode = 1
  }
}

export function formatPlan(plan: TopologyPlan): string[] {
  const names = new Map(plan.steps.map(s => [s.key, dependencyLabel(s)]))
  return plan.steps.map((step, index) => {
    const after = step.dependsOn.map(dep => names.get(dep) ?? dep)
    const line = `${String(index + 1).padStart(2)}. ${verbFor(step)} ${describeStep(step)}`
    return after.length > 0 ? `${line} (after: ${after.join(", ")})` : line
  })
}

function dependencyLabel(step: PlanStep): string {
  return step.type === "assign-parameter-context" ? "context assignment" : step.name
}

function verbFor(step: PlanStep): string {
  return step.type === "assign-parameter-context" ? "assign parameter context to" : "ensure"
}
