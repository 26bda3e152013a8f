/**
 * Resource identifiers
 *
 * A real run gets ids from the server; a dry run makes them up. Both flow
 * through the same code, so downstream steps never branch on mode.
 */

import * as crypto from "crypto"
import type { ResourceKind } from "../types/nifi.js"

export type ResourceId =
  | { kind: "real"; value: string }
  | { kind: "synthetic"; value: string }

const KIND_SLUGS: Record<ResourceKind, string> = {
  ProcessGroup: "pg",
  ParameterContext: "paramctx",
  ControllerService: "svc",
  Processor: "proc",
  Connection: "conn",
}

export function realId(value: string): ResourceId {
  return { kind: "real", value }
}

/**
 * Synthetic id for a resource that would have been created, e.g.
 * `dry-proc-Read-CDC-Slot-3f9a`. The prefix is derived from kind and name;
 * the suffix only keeps two same-named resources apart.
 */
export function syntheticId(kind: ResourceKind, name: string): ResourceId {
  const slug = name.trim().replace(/[^A-Za-z0-9]+/g, "-").replace(/^-|-$/g, "")
  const suffix = crypto.randomBytes(2).toString("hex")
  return { kind: "synthetic", value: `dry-${KIND_SLUGS[kind]}-${slug}-${suffix}` }
}

export function isSynthetic(id: ResourceId): boolean {
  return id.kind === "synthetic"
}

export function formatId(id: ResourceId): string {
  return id.kind === "synthetic" ? `${id.value} (synthetic)` : id.value
}
