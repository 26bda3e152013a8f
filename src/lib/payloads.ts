/**
 * Payload builders
 *
 * Turn topology specs plus resolved ids into the component bodies NiFi
 * expects. Reference values are swapped for ids here; a reference with no id
 * yet is a DependencyMissingError, never a placeholder string.
 *
 * @purpose Typed construction of NiFi create/update component payloads
 */

import type {
  ConnectionComponent,
  ControllerServiceComponent,
  ParameterContextComponent,
  ProcessGroupComponent,
  ProcessorComponent,
} from "../types/nifi.js"
import type {
  ConnectionSpec,
  ControllerServiceSpec,
  ParameterContextSpec,
  ProcessGroupSpec,
  ProcessorSpec,
  ResolvedValue,
} from "../types/topology.js"
import type { ResourceId } from "./resource-id.js"
import { DependencyMissingError } from "./errors.js"

export type ResolvedIds = ReadonlyMap<string, ResourceId>

export function resolveProperties(
  owner: string,
  properties: Record<string, ResolvedValue>,
  ids: ResolvedIds
): Record<string, string> {
  const out: Record<string, string> = {}
  const missing: string[] = []

  for (const [name, value] of Object.entries(properties)) {
    if (typeof value === "object") {
      const id = ids.get(value.ref)
      if (!id) {
        missing.push(value.ref)
        continue
      }
      out[name] = id.value
    } else {
      out[name] = String(value)
    }
  }

  if (missing.length > 0) {
    throw new DependencyMissingError(`'${owner}'`, missing)
  }
  return out
}

// ============================================================================
// Process groups & parameter contexts
// ============================================================================

export function processGroupComponent(spec: ProcessGroupSpec): ProcessGroupComponent {
  const component: ProcessGroupComponent = { name: spec.name, position: { ...spec.position } }
  if (spec.comments) component.comments = spec.comments
  return component
}

export function parameterContextComponent(spec: ParameterContextSpec): ParameterContextComponent {
  const component: ParameterContextComponent = {
    name: spec.name,
    parameters: spec.parameters.map(p => ({
      parameter: {
        name: p.name,
        value: p.value,
        sensitive: p.sensitive,
        ...(p.description ? { description: p.description } : {}),
      },
    })),
  }
  if (spec.description) component.description = spec.description
  return component
}

export function parameterContextAssignment(contextId: ResourceId): ProcessGroupComponent {
  return { parameterContext: { id: contextId.value } }
}

// ============================================================================
// Controller services
// ============================================================================

export function controllerServiceComponent(spec: ControllerServiceSpec, ids: ResolvedIds): ControllerServiceComponent {
  const component: ControllerServiceComponent = {
    name: spec.name,
    type: spec.type,
    properties: resolveProperties(spec.name, spec.properties, ids),
  }
  if (spec.comments) component.comments = spec.comments
  return component
}

// ============================================================================
// Processors
// ============================================================================

/** Created bare; configuration follows as a revisioned write. */
export function processorCreateComponent(spec: ProcessorSpec): ProcessorComponent {
  return { name: spec.name, type: spec.type, position: { ...spec.position } }
}

export function processorConfigComponent(spec: ProcessorSpec, ids: ResolvedIds): ProcessorComponent {
  return {
    config: {
      properties: resolveProperties(spec.name, spec.properties, ids),
      schedulingPeriod: spec.scheduling.period,
      schedulingStrategy: spec.scheduling.strategy,
      executionNode: spec.scheduling.executionNode,
      penaltyDuration: spec.penaltyDuration,
      yieldDuration: spec.yieldDuration,
      bulletinLevel: spec.bulletinLevel,
      runDurationMillis: spec.scheduling.runDurationMillis,
      concurrentlySchedulableTaskCount: spec.scheduling.concurrentTasks,
      autoTerminatedRelationships: [...spec.autoTerminate],
      ...(spec.comments ? { comments: spec.comments } : {}),
    },
  }
}

// ============================================================================
// Connections
// ============================================================================

export function connectionComponent(spec: ConnectionSpec, groupId: ResourceId, ids: ResolvedIds): ConnectionComponent {
  const sourceId = ids.get(spec.source)
  const destinationId = ids.get(spec.destination)
  const missing = [
    ...(sourceId ? [] : [spec.source]),
    ...(destinationId ? [] : [spec.destination]),
  ]
  if (!sourceId || !destinationId) {
    throw new DependencyMissingError(`'${spec.name}'`, missing)
  }

  return {
    name: spec.name,
    source: { id: sourceId.value, type: "PROCESSOR", groupId: groupId.value },
    destination: { id: destinationId.value, type: "PROCESSOR", groupId: groupId.value },
    selectedRelationships: [spec.relationship],
    flowFileExpiration: spec.flowFileExpiration,
    backPressureObjectThreshold: String(spec.backPressureObjectThreshold),
    backPressureDataSizeThreshold: spec.backPressureDataSizeThreshold,
    loadBalanceStrategy: "DO_NOT_LOAD_BALANCE",
    loadBalanceCompression: "DO_NOT_COMPRESS",
  }
}
