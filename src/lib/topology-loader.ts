/**
 * Topology Loader
 *
 * Reads a desired-topology YAML file, validates it, substitutes `{ setting }`
 * values from the app config and turns the result into an ordered plan.
 * Every problem is collected and reported at once as a TopologyError.
 *
 * @purpose Load and validate declarative NiFi topologies
 */

import * as fs from "fs"
import * as path from "path"
import { parse as parseYaml } from "yaml"
import type { Position, PropertyValue } from "../types/nifi.js"
import {
  ASSIGN_CONTEXT_KEY,
  PARAMETER_CONTEXT_KEY,
  PROCESS_GROUP_KEY,
  type ConnectionSpec,
  type ControllerServiceSpec,
  type ParameterContextSpec,
  type PlanStep,
  type ProcessGroupSpec,
  type ProcessorSpec,
  type ResolvedValue,
  type TopologyPlan,
  type TopologySpec,
} from "../types/topology.js"
import { type AppConfig, getSetting } from "../utils/env-config.js"
import { detectCycles, findUnknownDependencies, getExecutionOrder } from "./dependency-graph.js"
import { TopologyError, isRecord } from "./errors.js"

export const BUILTIN_TOPOLOGIES = ["cdc", "outbox"] as const
export type BuiltinTopology = (typeof BUILTIN_TOPOLOGIES)[number]

export const TOPOLOGY_DIR = path.resolve(__dirname, "..", "..", "topologies")

const DEFAULT_SCHEDULING = {
  period: "0 sec",
  strategy: "TIMER_DRIVEN",
  executionNode: "ALL",
  concurrentTasks: 1,
  runDurationMillis: 0,
}

const RESERVED_KEYS = new Set([PROCESS_GROUP_KEY, PARAMETER_CONTEXT_KEY, ASSIGN_CONTEXT_KEY])

export interface LoadOptions {
  /** Without a config, `{ setting }` values render as `<setting:path>`. */
  config?: AppConfig
}

// ============================================================================
// Loading
// ============================================================================

export function resolveTopologyPath(nameOrPath: string): string {
  const builtin: readonly string[] = BUILTIN_TOPOLOGIES
  if (builtin.includes(nameOrPath)) {
    return path.join(TOPOLOGY_DIR, `${nameOrPath}.yaml`)
  }
  return path.resolve(nameOrPath)
}

export function loadTopology(nameOrPath: string, options: LoadOptions = {}): TopologySpec {
  const filePath = resolveTopologyPath(nameOrPath)
  if (!fs.existsSync(filePath)) {
    throw new TopologyError(nameOrPath, [`File not found: ${filePath}`])
  }

  let raw: unknown
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf-8"))
  } catch (error) {
    throw new TopologyError(filePath, [`YAML parse error: ${error instanceof Error ? error.message : String(error)}`])
  }

  return parseTopology(raw, filePath, options)
}

/**
 * Validate an already-parsed document. Throws TopologyError listing every
 * problem found.
 */
export function parseTopology(raw: unknown, source: string, options: LoadOptions = {}): TopologySpec {
  const issues: string[] = []
  const ctx = new ParseContext(issues, options.config)

  if (!isRecord(raw)) {
    throw new TopologyError(source, ["Topology must be a mapping"])
  }

  const name = ctx.requireString(raw, "name", "topology")

  const pgRaw = raw.processGroup
  let processGroup: ProcessGroupSpec = { name: "", position: { x: 100, y: 100 } }
  if (!isRecord(pgRaw)) {
    issues.push(`"processGroup" must be a mapping`)
  } else {
    processGroup = {
      name: ctx.requireString(pgRaw, "name", "processGroup"),
      position: ctx.position(pgRaw.position, "processGroup", { x: 100, y: 100 }),
      comments: ctx.optionalString(pgRaw, "comments", "processGroup"),
    }
  }

  const parameterContext = raw.parameterContext === undefined
    ? undefined
    : ctx.parameterContext(raw.parameterContext)

  const controllerServices = ctx.list(raw, "controllerServices").map((entry, i) => ctx.controllerService(entry, i))
  const processors = ctx.list(raw, "processors").map((entry, i) => ctx.processor(entry, i))

  // Keys must be unique across services and processors
  const keys = new Set<string>()
  for (const item of [...controllerServices, ...processors]) {
    if (!item.key) continue
    if (RESERVED_KEYS.has(item.key)) {
      issues.push(`Key "${item.key}" is reserved`)
    } else if (keys.has(item.key)) {
      issues.push(`Duplicate key "${item.key}"`)
    }
    keys.add(item.key)
  }

  // Resources are looked up by kind and name, so a repeated name would alias
  reportDuplicateNames("controller service", controllerServices, issues)
  reportDuplicateNames("processor", processors, issues)

  const processorKeys = new Set(processors.map(p => p.key))
  const nameByKey = new Map([...controllerServices, ...processors].map(r => [r.key, r.name]))
  const connections = ctx.list(raw, "connections").map((entry, i) => ctx.connection(entry, i, processorKeys, nameByKey))

  const connectionNames = new Set<string>()
  const connectionKeys = new Set<string>()
  for (const conn of connections) {
    if (connectionNames.has(conn.name) || connectionKeys.has(conn.key)) {
      issues.push(`Duplicate connection "${conn.name}"`)
    }
    connectionNames.add(conn.name)
    connectionKeys.add(conn.key)
  }

  // References must point at a declared service or processor
  for (const item of [...controllerServices, ...processors]) {
    for (const [prop, value] of Object.entries(item.properties)) {
      if (isRef(value) && !keys.has(value.ref)) {
        issues.push(`"${item.key}" property "${prop}" references unknown resource "${value.ref}"`)
      }
    }
  }

  const preflight = ctx.preflight(raw.preflight)
  const nextSteps = Array.isArray(raw.nextSteps)
    ? raw.nextSteps.filter((s): s is string => typeof s === "string")
    : []

  if (issues.length > 0) {
    throw new TopologyError(source, issues)
  }

  const spec: TopologySpec = {
    name,
    description: ctx.optionalString(raw, "description", "topology"),
    processGroup,
    parameterContext,
    controllerServices,
    processors,
    connections,
    preflight,
    nextSteps,
  }

  // Cycles only show up once the plan's edges exist
  buildPlan(spec, source)
  return spec
}

// ============================================================================
// Planning
// ============================================================================

export function buildPlan(topology: TopologySpec, source = topology.name): TopologyPlan {
  const steps: PlanStep[] = [
    {
      type: "process-group",
      key: PROCESS_GROUP_KEY,
      kind: "ProcessGroup",
      name: topology.processGroup.name,
      dependsOn: [],
      spec: topology.processGroup,
    },
  ]

  if (topology.parameterContext) {
    steps.push(
      {
        type: "parameter-context",
        key: PARAMETER_CONTEXT_KEY,
        kind: "ParameterContext",
        name: topology.parameterContext.name,
        dependsOn: [],
        spec: topology.parameterContext,
      },
      {
        type: "assign-parameter-context",
        key: ASSIGN_CONTEXT_KEY,
        kind: "ProcessGroup",
        name: topology.processGroup.name,
        dependsOn: [PROCESS_GROUP_KEY, PARAMETER_CONTEXT_KEY],
      }
    )
  }

  // Services and processors wait for the context so #{...} parameters resolve
  const scopeDeps = topology.parameterContext ? [PROCESS_GROUP_KEY, ASSIGN_CONTEXT_KEY] : [PROCESS_GROUP_KEY]

  for (const svc of topology.controllerServices) {
    steps.push({
      type: "controller-service",
      key: svc.key,
      kind: "ControllerService",
      name: svc.name,
      dependsOn: [...scopeDeps, ...refsOf(svc.properties)],
      spec: svc,
    })
  }

  for (const proc of topology.processors) {
    steps.push({
      type: "processor",
      key: proc.key,
      kind: "Processor",
      name: proc.name,
      dependsOn: [...scopeDeps, ...refsOf(proc.properties)],
      spec: proc,
    })
  }

  for (const conn of topology.connections) {
    steps.push({
      type: "connection",
      key: conn.key,
      kind: "Connection",
      name: conn.name,
      dependsOn: [PROCESS_GROUP_KEY, conn.source, conn.destination],
      spec: conn,
    })
  }

  const unknown = findUnknownDependencies(steps)
  if (unknown.length > 0) {
    throw new TopologyError(source, unknown)
  }
  const cycle = detectCycles(steps)
  if (cycle) {
    throw new TopologyError(source, [`Dependency cycle detected: ${cycle.join(" -> ")}`])
  }

  return { topology, steps: getExecutionOrder(steps) }
}

export function isRef(value: ResolvedValue): value is { ref: string } {
  return typeof value === "object" && value !== null && "ref" in value
}

function reportDuplicateNames(kind: string, items: Array<{ name: string }>, issues: string[]): void {
  const seen = new Set<string>()
  for (const { name } of items) {
    if (!name) continue
    if (seen.has(name)) issues.push(`Duplicate ${kind} name "${name}"`)
    seen.add(name)
  }
}

function refsOf(properties: Record<string, ResolvedValue>): string[] {
  const refs: string[] = []
  for (const value of Object.values(properties)) {
    if (isRef(value) && !refs.includes(value.ref)) refs.push(value.ref)
  }
  return refs
}

export function connectionName(sourceName: string, relationship: string, destinationName: string): string {
  return `${sourceName} -[${relationship}]-> ${destinationName}`
}

// ============================================================================
// Field parsing
// ============================================================================

class ParseContext {
  constructor(private issues: string[], private config?: AppConfig) {}

  requireString(obj: Record<string, unknown>, field: string, where: string): string {
    const value = obj[field]
    if (typeof value !== "string" || value.trim() === "") {
      this.issues.push(`${where}: "${field}" is required`)
      return ""
    }
    return value
  }

  optionalString(obj: Record<string, unknown>, field: string, where: string): string | undefined {
    const value = obj[field]
    if (value === undefined || value === null) return undefined
    if (typeof value !== "string") {
      this.issues.push(`${where}: "${field}" must be a string`)
      return undefined
    }
    return value
  }

  optionalNumber(obj: Record<string, unknown>, field: string, where: string, fallback: number): number {
    const value = obj[field]
    if (value === undefined) return fallback
    if (typeof value !== "number" || !Number.isFinite(value)) {
      this.issues.push(`${where}: "${field}" must be a number`)
      return fallback
    }
    return value
  }

  position(value: unknown, where: string, fallback: Position): Position {
    if (value === undefined) return fallback
    if (!isRecord(value) || typeof value.x !== "number" || typeof value.y !== "number") {
      this.issues.push(`${where}: "position" must have numeric x and y`)
      return fallback
    }
    return { x: value.x, y: value.y }
  }

  list(obj: Record<string, unknown>, field: string): Record<string, unknown>[] {
    const value = obj[field]
    if (value === undefined || value === null) return []
    if (!Array.isArray(value)) {
      this.issues.push(`"${field}" must be a list`)
      return []
    }
    return value.filter((entry, i) => {
      if (!isRecord(entry)) {
        this.issues.push(`${field}[${i}] must be a mapping`)
        return false
      }
      return true
    })
  }

  stringList(obj: Record<string, unknown>, field: string, where: string): string[] {
    const value = obj[field]
    if (value === undefined || value === null) return []
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
      this.issues.push(`${where}: "${field}" must be a list of strings`)
      return []
    }
    return value
  }

  value(raw: unknown, where: string): ResolvedValue | undefined {
    if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
      return raw
    }
    if (isRecord(raw)) {
      if (typeof raw.ref === "string") return { ref: raw.ref }
      if (typeof raw.setting === "string") return this.setting(raw.setting, where)
    }
    this.issues.push(`${where}: value must be a string, number, boolean, { ref } or { setting }`)
    return undefined
  }

  setting(settingPath: string, where: string): PropertyValue {
    if (!this.config) return `<setting:${settingPath}>`
    const value = getSetting(this.config, settingPath)
    if (value === undefined) {
      this.issues.push(`${where}: unknown setting "${settingPath}"`)
      return ""
    }
    return value
  }

  properties(obj: Record<string, unknown>, where: string): Record<string, ResolvedValue> {
    const raw = obj.properties
    if (raw === undefined || raw === null) return {}
    if (!isRecord(raw)) {
      this.issues.push(`${where}: "properties" must be a mapping`)
      return {}
    }
    const out: Record<string, ResolvedValue> = {}
    for (const [prop, value] of Object.entries(raw)) {
      const resolved = this.value(value, `${where} property "${prop}"`)
      if (resolved !== undefined) out[prop] = resolved
    }
    return out
  }

  parameterContext(raw: unknown): ParameterContextSpec | undefined {
    if (!isRecord(raw)) {
      this.issues.push(`"parameterContext" must be a mapping`)
      return undefined
    }
    const name = this.requireString(raw, "name", "parameterContext")
    const parameters = this.list(raw, "parameters").map((entry, i) => {
      const where = `parameterContext.parameters[${i}]`
      const value = this.value(entry.value, where)
      if (value !== undefined && typeof value === "object") {
        this.issues.push(`${where}: parameters cannot reference resources`)
      }
      return {
        name: this.requireString(entry, "name", where),
        value: value === undefined || typeof value === "object" ? "" : String(value),
        sensitive: entry.sensitive === true,
        description: this.optionalString(entry, "description", where),
      }
    })
    return { name, description: this.optionalString(raw, "description", "parameterContext"), parameters }
  }

  controllerService(entry: Record<string, unknown>, index: number): ControllerServiceSpec {
    const where = `controllerServices[${index}]`
    return {
      key: this.requireString(entry, "key", where),
      name: this.requireString(entry, "name", where),
      type: this.requireString(entry, "type", where),
      properties: this.properties(entry, where),
      enable: entry.enable !== false,
      comments: this.optionalString(entry, "comments", where),
    }
  }

  processor(entry: Record<string, unknown>, index: number): ProcessorSpec {
    const where = `processors[${index}]`
    const sched = isRecord(entry.scheduling) ? entry.scheduling : {}
    if (entry.scheduling !== undefined && !isRecord(entry.scheduling)) {
      this.issues.push(`${where}: "scheduling" must be a mapping`)
    }
    return {
      key: this.requireString(entry, "key", where),
      name: this.requireString(entry, "name", where),
      type: this.requireString(entry, "type", where),
      position: this.position(entry.position, where, { x: 0, y: 0 }),
      properties: this.properties(entry, where),
      scheduling: {
        period: this.optionalString(sched, "period", where) ?? DEFAULT_SCHEDULING.period,
        strategy: this.optionalString(sched, "strategy", where) ?? DEFAULT_SCHEDULING.strategy,
        executionNode: this.optionalString(sched, "executionNode", where) ?? DEFAULT_SCHEDULING.executionNode,
        concurrentTasks: this.optionalNumber(sched, "concurrentTasks", where, DEFAULT_SCHEDULING.concurrentTasks),
        runDurationMillis: this.optionalNumber(sched, "runDurationMillis", where, DEFAULT_SCHEDULING.runDurationMillis),
      },
      penaltyDuration: this.optionalString(entry, "penaltyDuration", where) ?? "30 sec",
      yieldDuration: this.optionalString(entry, "yieldDuration", where) ?? "1 sec",
      bulletinLevel: this.optionalString(entry, "bulletinLevel", where) ?? "WARN",
      autoTerminate: this.stringList(entry, "autoTerminate", where),
      comments: this.optionalString(entry, "comments", where),
    }
  }

  connection(
    entry: Record<string, unknown>,
    index: number,
    processorKeys: Set<string>,
    nameByKey: Map<string, string>
  ): ConnectionSpec {
    const where = `connections[${index}]`
    const source = this.requireString(entry, "source", where)
    const destination = this.requireString(entry, "destination", where)
    const relationship = this.requireString(entry, "relationship", where)

    for (const [field, key] of [["source", source], ["destination", destination]] as const) {
      if (key && !processorKeys.has(key)) {
        this.issues.push(`${where}: ${field} "${key}" is not a declared processor`)
      }
    }

    const backPressure = isRecord(entry.backPressure) ? entry.backPressure : {}
    const explicitName = this.optionalString(entry, "name", where)

    return {
      key: `${source}-[${relationship}]->${destination}`,
      name: explicitName ?? connectionName(nameByKey.get(source) ?? source, relationship, nameByKey.get(destination) ?? destination),
      source,
      destination,
      relationship,
      backPressureObjectThreshold: this.optionalNumber(backPressure, "objectThreshold", where, 10000),
      backPressureDataSizeThreshold: this.optionalString(backPressure, "dataSizeThreshold", where) ?? "1 GB",
      flowFileExpiration: this.optionalString(entry, "flowFileExpiration", where) ?? "0 sec",
    }
  }

  preflight(raw: unknown): TopologySpec["preflight"] {
    if (raw === undefined || raw === null) return { tables: [] }
    if (!isRecord(raw)) {
      this.issues.push(`"preflight" must be a mapping`)
      return { tables: [] }
    }
    const tables = this.stringList(raw, "tables", "preflight")
    const slot = raw.replicationSlot
    if (slot === undefined) return { tables }
    if (!isRecord(slot)) {
      this.issues.push(`preflight: "replicationSlot" must be a mapping`)
      return { tables }
    }
    return {
      tables,
      replicationSlot: {
        name: this.requireString(slot, "name", "preflight.replicationSlot"),
        plugin: this.optionalString(slot, "plugin", "preflight.replicationSlot") ?? "test_decoding",
      },
    }
  }
}
