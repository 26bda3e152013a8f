/**
 * Convergence Engine
 *
 * Walks a topology plan in dependency order and makes the remote flow match
 * it: find by name, create what is missing, re-assert configuration on
 * everything. Running it twice creates nothing the second time.
 *
 * A step whose prerequisites have no id is skipped with a warning. A step
 * that fails is reported and the walk carries on with independent steps.
 *
 * Dry runs take exactly this path; the client decides whether anything goes
 * over the wire.
 *
 * @purpose Idempotent find-or-create-then-configure over a NiFi topology
 */

import type { ComponentByKind, ResourceKind } from "../types/nifi.js"
import {
  PARAMETER_CONTEXT_KEY,
  PROCESS_GROUP_KEY,
  type PlanStep,
  type TopologyPlan,
} from "../types/topology.js"
import type { Logger } from "./logger.js"
import type { ResourceUpdate, RevisionedClient, Scope } from "./nifi-client.js"
import { type ResourceId, formatId } from "./resource-id.js"
import { type RetryOptions, configureWithRetry } from "./revision-retry.js"
import {
  connectionComponent,
  controllerServiceComponent,
  parameterContextAssignment,
  parameterContextComponent,
  processGroupComponent,
  processorConfigComponent,
  processorCreateComponent,
} from "./payloads.js"
import {
  DependencyMissingError,
  HttpResponseError,
  RetriesExhaustedError,
  describeError,
} from "./errors.js"

// ============================================================================
// Types
// ============================================================================

export type DecisionAction = "create" | "reuse" | "configure" | "skip" | "fail"

export interface Decision {
  step: string
  kind: ResourceKind
  name: string
  action: DecisionAction
  id?: ResourceId
  error?: Error
}

export interface ConvergenceCounts {
  created: number
  reused: number
  configured: number
  skipped: number
  failed: number
}

export interface ConvergenceReport {
  topology: string
  dryRun: boolean
  decisions: Decision[]
  ids: Map<string, ResourceId>
  counts: ConvergenceCounts
  ok: boolean
}

export interface ConvergenceOptions {
  retry?: RetryOptions
}

const KIND_LABELS: Record<ResourceKind, string> = {
  ProcessGroup: "process group",
  ParameterContext: "parameter context",
  ControllerService: "controller service",
  Processor: "processor",
  Connection: "connection",
}

const ENABLED_STATES = new Set(["ENABLED", "ENABLING"])

export function describeStep(step: Pick<PlanStep, "kind" | "name">): string {
  return `${KIND_LABELS[step.kind]} '${step.name}'`
}

// ============================================================================
// Engine
// ============================================================================

export class ConvergenceEngine {
  private client: RevisionedClient
  private logger: Logger
  private options: ConvergenceOptions

  constructor(client: RevisionedClient, logger: Logger, options: ConvergenceOptions = {}) {
    this.client = client
    this.logger = logger
    this.options = options
  }

  async converge(plan: TopologyPlan): Promise<ConvergenceReport> {
    const ids = new Map<string, ResourceId>()
    const decisions: Decision[] = []
    const counts: ConvergenceCounts = { created: 0, reused: 0, configured: 0, skipped: 0, failed: 0 }
    const namesByKey = new Map(plan.steps.map(s => [s.key, s.name]))

    for (const step of plan.steps) {
      const missing = step.dependsOn.filter(dep => !ids.has(dep))
      if (missing.length > 0) {
        const error = new DependencyMissingError(
          describeStep(step),
          missing.map(dep => namesByKey.get(dep) ?? dep)
        )
        this.logger.warn(error.message)
        decisions.push({ step: step.key, kind: step.kind, name: step.name, action: "skip", error })
        counts.skipped++
        continue
      }

      const decision = await this.runStep(step, ids, counts)
      decisions.push(decision)
      if (decision.action === "create") counts.created++
      if (decision.action === "reuse") counts.reused++
      if (decision.action === "fail") counts.failed++
    }

    return {
      topology: plan.topology.name,
      dryRun: this.client.dryRun,
      decisions,
      ids,
      counts,
      ok: counts.failed === 0 && counts.skipped === 0,
    }
  }

  private async runStep(step: PlanStep, ids: Map<string, ResourceId>, counts: ConvergenceCounts): Promise<Decision> {
    const base = { step: step.key, kind: step.kind, name: step.name }
    let action: DecisionAction = "configure"
    let id: ResourceId | undefined

    try {
      switch (step.type) {
        case "process-group": {
          const root = await this.client.getRootGroupId()
          const ensured = await this.ensure(step, root, processGroupComponent(step.spec))
          id = ensured.id
          action = ensured.action
          ids.set(step.key, id)
          break
        }

        case "parameter-context": {
          const ensured = await this.ensure(step, null, parameterContextComponent(step.spec))
          id = ensured.id
          action = ensured.action
          ids.set(step.key, id)
          break
        }

        case "assign-parameter-context": {
          const groupId = this.need(ids, PROCESS_GROUP_KEY)
          const contextId = this.need(ids, PARAMETER_CONTEXT_KEY)
          id = groupId
          await this.configure(step, groupId, {
            type: "component",
            component: parameterContextAssignment(contextId),
          }, counts)
          this.logger.success(`Parameter context assigned to ${describeStep(step)}`)
          ids.set(step.key, groupId)
          break
        }

        case "controller-service": {
          const scope = this.need(ids, PROCESS_GROUP_KEY)
          const component = controllerServiceComponent(step.spec, ids)
          const ensured = await this.ensure(step, scope, component)
          id = ensured.id
          action = ensured.action
          ids.set(step.key, id)

          if (action === "reuse" && (await this.isEnabled(id))) {
            this.logger.info(`${describeStep(step)} is enabled; leaving its configuration in place`)
            break
          }
          await this.configure(step, id, { type: "component", component }, counts)
          if (step.spec.enable) {
            await this.configure(step, id, { type: "run-status", state: "ENABLED" }, counts)
            if (!this.client.dryRun) this.logger.success(`${describeStep(step)} enabled`)
          }
          break
        }

        case "processor": {
          const scope = this.need(ids, PROCESS_GROUP_KEY)
          // Resolve references before creating anything
          const config = processorConfigComponent(step.spec, ids)
          const ensured = await this.ensure(step, scope, processorCreateComponent(step.spec))
          id = ensured.id
          action = ensured.action
          ids.set(step.key, id)
          await this.configure(step, id, { type: "component", component: config }, counts)
          if (!this.client.dryRun) this.logger.success(`Configured ${describeStep(step)}`)
          break
        }

        case "connection": {
          const scope = this.need(ids, PROCESS_GROUP_KEY)
          const ensured = await this.ensure(step, scope, connectionComponent(step.spec, scope, ids))
          id = ensured.id
          action = ensured.action
          ids.set(step.key, id)
          break
        }
      }

      return { ...base, action, id }
    } catch (error) {
      this.reportFailure(step, error)
      return {
        ...base,
        action: "fail",
        id,
        error: error instanceof Error ? error : new Error(describeError(error)),
      }
    }
  }

  /** Find by name in scope, create when absent. */
  private async ensure(
    step: PlanStep,
    scope: Scope,
    component: ComponentByKind[ResourceKind]
  ): Promise<{ id: ResourceId; action: "create" | "reuse" }> {
    const label = describeStep(step)
    const existing = await this.client.findResourceByName(step.kind, scope, step.name)
    if (existing) {
      this.logger.info(`Reusing existing ${label}: ${formatId(existing)}`)
      return { id: existing, action: "reuse" }
    }

    if (!this.client.dryRun) this.logger.info(`Creating ${label}...`)
    const created = await this.client.createResource(step.kind, scope, step.name, component)
    if (!this.client.dryRun) this.logger.success(`Created ${label}: ${formatId(created.id)}`)
    return { id: created.id, action: "create" }
  }

  private async configure(
    step: PlanStep,
    id: ResourceId,
    update: ResourceUpdate,
    counts: ConvergenceCounts
  ): Promise<void> {
    const outcome = await configureWithRetry(this.client, this.logger, step.kind, id, update, {
      ...this.options.retry,
      label: describeStep(step),
    })
    if (!outcome.ok) {
      throw outcome.error
    }
    counts.configured++
  }

  private async isEnabled(id: ResourceId): Promise<boolean> {
    const current = await this.client.fetchResource("ControllerService", id)
    const state = current.component.state
    return typeof state === "string" && ENABLED_STATES.has(state)
  }

  private need(ids: Map<string, ResourceId>, key: string): ResourceId {
    const id = ids.get(key)
    if (!id) {
      throw new DependencyMissingError(key, [key])
    }
    return id
  }

  private reportFailure(step: PlanStep, error: unknown): void {
    const label = describeStep(step)

    if (error instanceof RetriesExhaustedError) {
      this.logger.error(`${label}: ${error.message}`)
      return
    }

    this.logger.error(`${label}: ${describeError(error)}`)
    if (error instanceof HttpResponseError) {
      if (error.body) this.logger.error(`  Response body: ${error.body}`)
      for (const message of error.validationErrors) {
        this.logger.error(`  - ${message}`)
      }
    }
  }
}
