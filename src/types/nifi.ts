/**
 * NiFi REST API entity shapes
 *
 * Only the fields this tool reads or writes are modelled. Everything the
 * server sends back beyond these is carried through untouched.
 *
 * @purpose Wire types for the flow engine's revisioned entities
 */

export type ResourceKind =
  | "ProcessGroup"
  | "ParameterContext"
  | "ControllerService"
  | "Processor"
  | "Connection"

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "ProcessGroup",
  "ParameterContext",
  "ControllerService",
  "Processor",
  "Connection",
]

export interface Revision {
  version: number
  clientId?: string
}

export interface Position {
  x: number
  y: number
}

export type PropertyValue = string | number | boolean

// ============================================================================
// Components
// ============================================================================

export interface ProcessGroupComponent {
  id?: string
  name?: string
  position?: Position
  parameterContext?: { id: string }
  comments?: string
}

export interface ParameterEntry {
  parameter: {
    name: string
    value: string
    sensitive?: boolean
    description?: string
  }
}

export interface ParameterContextComponent {
  id?: string
  name?: string
  description?: string
  parameters?: ParameterEntry[]
}

export interface ControllerServiceComponent {
  id?: string
  parentGroupId?: string
  name?: string
  type?: string
  properties?: Record<string, string | null>
  state?: string
  comments?: string
  validationErrors?: string[]
}

export interface ProcessorConfig {
  properties?: Record<string, string | null>
  schedulingPeriod?: string
  schedulingStrategy?: string
  executionNode?: string
  penaltyDuration?: string
  yieldDuration?: string
  bulletinLevel?: string
  runDurationMillis?: number
  concurrentlySchedulableTaskCount?: number
  autoTerminatedRelationships?: string[]
  comments?: string
}

export interface ProcessorComponent {
  id?: string
  parentGroupId?: string
  name?: string
  type?: string
  position?: Position
  state?: string
  config?: ProcessorConfig
  validationErrors?: string[]
}

export interface Connectable {
  id: string
  type: "PROCESSOR" | "INPUT_PORT" | "OUTPUT_PORT" | "FUNNEL"
  groupId: string
}

export interface ConnectionComponent {
  id?: string
  parentGroupId?: string
  name?: string
  source?: Connectable
  destination?: Connectable
  selectedRelationships?: string[]
  flowFileExpiration?: string
  backPressureObjectThreshold?: string
  backPressureDataSizeThreshold?: string
  loadBalanceStrategy?: string
  loadBalanceCompression?: string
}

export interface ComponentByKind {
  ProcessGroup: ProcessGroupComponent
  ParameterContext: ParameterContextComponent
  ControllerService: ControllerServiceComponent
  Processor: ProcessorComponent
  Connection: ConnectionComponent
}

export type AnyComponent = ComponentByKind[ResourceKind]

// ============================================================================
// Entities (revision + component envelope)
// ============================================================================

export interface Entity<C = AnyComponent> {
  id?: string | null
  revision?: Revision
  component?: C
}

/** Body of every create call: always revision version 0. */
export interface CreateRequest<C = AnyComponent> {
  revision: { version: 0 }
  component: C
}

export interface UpdateRequest<C = AnyComponent> {
  revision: Revision
  component: C & { id: string }
}

export interface RunStatusRequest {
  revision: Revision
  state: "ENABLED" | "DISABLED"
}

export interface ProcessGroupFlowEntity {
  processGroupFlow?: {
    id?: string | null
    flow?: {
      processGroups?: Entity<ProcessGroupComponent>[]
    }
  }
}
