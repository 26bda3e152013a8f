/**
 * Desired-topology model
 *
 * What a topology file declares, after loading. Property values that point
 * at another declared resource stay as `{ ref }` until convergence resolves
 * them to a remote id.
 */

import type { Position, PropertyValue, ResourceKind } from "./nifi.js"

export interface RefValue {
  ref: string
}

export interface SettingValue {
  setting: string
}

/** As written in a topology file. */
export type RawValue = PropertyValue | RefValue | SettingValue

/** After settings are substituted. */
export type ResolvedValue = PropertyValue | RefValue

export interface ProcessGroupSpec {
  name: string
  position: Position
  comments?: string
}

export interface ParameterSpec {
  name: string
  value: string
  sensitive: boolean
  description?: string
}

export interface ParameterContextSpec {
  name: string
  description?: string
  parameters: ParameterSpec[]
}

export interface ControllerServiceSpec {
  key: string
  name: string
  type: string
  properties: Record<string, ResolvedValue>
  /** Enable after configuring. Defaults to true. */
  enable: boolean
  comments?: string
}

export interface SchedulingSpec {
  period: string
  strategy: string
  executionNode: string
  concurrentTasks: number
  runDurationMillis: number
}

export interface ProcessorSpec {
  key: string
  name: string
  type: string
  position: Position
  properties: Record<string, ResolvedValue>
  scheduling: SchedulingSpec
  penaltyDuration: string
  yieldDuration: string
  bulletinLevel: string
  autoTerminate: string[]
  comments?: string
}

export interface ConnectionSpec {
  key: string
  name: string
  source: string
  destination: string
  relationship: string
  backPressureObjectThreshold: number
  backPressureDataSizeThreshold: string
  flowFileExpiration: string
}

export interface ReplicationSlotSpec {
  name: string
  plugin: string
}

export interface PreflightSpec {
  tables: string[]
  replicationSlot?: ReplicationSlotSpec
}

export interface TopologySpec {
  name: string
  description?: string
  processGroup: ProcessGroupSpec
  parameterContext?: ParameterContextSpec
  controllerServices: ControllerServiceSpec[]
  processors: ProcessorSpec[]
  connections: ConnectionSpec[]
  preflight: PreflightSpec
  /** Human-readable follow-up instructions printed after setup. */
  nextSteps: string[]
}

// ============================================================================
// Plan
// ============================================================================

export const PROCESS_GROUP_KEY = "processGroup"
export const PARAMETER_CONTEXT_KEY = "parameterContext"
export const ASSIGN_CONTEXT_KEY = "processGroup.parameterContext"

interface StepBase {
  key: string
  kind: ResourceKind
  name: string
  /** Keys of steps whose resolved id this step needs. */
  dependsOn: string[]
}

export type PlanStep =
  | (StepBase & { type: "process-group"; spec: ProcessGroupSpec })
  | (StepBase & { type: "parameter-context"; spec: ParameterContextSpec })
  | (StepBase & { type: "assign-parameter-context" })
  | (StepBase & { type: "controller-service"; spec: ControllerServiceSpec })
  | (StepBase & { type: "processor"; spec: ProcessorSpec })
  | (StepBase & { type: "connection"; spec: ConnectionSpec })

export interface TopologyPlan {
  topology: TopologySpec
  steps: PlanStep[]
}
