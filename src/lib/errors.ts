/**
 * Error taxonomy
 *
 * Every failure the provisioner can report has its own class so callers can
 * tell a retried revision race apart from a fatal rejection.
 *
 * @purpose Typed errors for config, auth, readiness, HTTP and topology failures
 */

import type { ResourceKind } from "../types/nifi.js"

export type ErrorCode =
  | "CONFIG"
  | "AUTHENTICATION"
  | "TIMEOUT"
  | "NOT_FOUND"
  | "REVISION_CONFLICT"
  | "CREATE"
  | "CONFIGURATION"
  | "RETRIES_EXHAUSTED"
  | "DEPENDENCY_MISSING"
  | "TOPOLOGY"
  | "PREFLIGHT"
  | "TRANSPORT"
  | "READ"

export class ProvisionError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class ConfigError extends ProvisionError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super("CONFIG", `Invalid configuration:\n${issues.map(i => `  - ${i}`).join("\n")}`)
    this.issues = issues
  }
}

export class AuthenticationError extends ProvisionError {
  constructor(message: string) {
    super("AUTHENTICATION", message)
  }
}

export class TimeoutError extends ProvisionError {
  readonly attempts: number
  readonly elapsedMs: number
  readonly lastError?: string

  constructor(attempts: number, elapsedMs: number, lastError?: string) {
    super(
      "TIMEOUT",
      `NiFi was not ready after ${attempts} attempts (${Math.round(elapsedMs / 1000)}s elapsed)` +
        (lastError ? `: ${lastError}` : "")
    )
    this.attempts = attempts
    this.elapsedMs = elapsedMs
    this.lastError = lastError
  }
}

export class NotFoundError extends ProvisionError {
  readonly kind: ResourceKind | "RootProcessGroup"
  readonly id: string

  constructor(kind: ResourceKind | "RootProcessGroup", id: string) {
    super("NOT_FOUND", `${kind} ${id} not found (response carried no id)`)
    this.kind = kind
    this.id = id
  }
}

/**
 * Base for failures that carry an HTTP response worth showing the operator.
 */
export abstract class HttpResponseError extends ProvisionError {
  readonly status: number
  readonly body: string
  readonly kind: ResourceKind

  protected constructor(code: ErrorCode, message: string, kind: ResourceKind, status: number, body: string) {
    super(code, message)
    this.kind = kind
    this.status = status
    this.body = body
  }

  /** Validation messages NiFi embeds in a rejected entity, if any. */
  get validationErrors(): string[] {
    return extractValidationErrors(this.body)
  }
}

export class RevisionConflictError extends HttpResponseError {
  constructor(kind: ResourceKind, id: string, status: number, body: string) {
    super("REVISION_CONFLICT", `Stale revision writing ${kind} ${id} (HTTP ${status})`, kind, status, body)
  }
}

export class CreateError extends HttpResponseError {
  readonly resourceName: string

  constructor(kind: ResourceKind, name: string, status: number, body: string) {
    super("CREATE", `Failed to create ${kind} '${name}' (HTTP ${status})`, kind, status, body)
    this.resourceName = name
  }
}

export class ConfigurationError extends HttpResponseError {
  readonly resourceId: string

  constructor(kind: ResourceKind, id: string, status: number, body: string) {
    super("CONFIGURATION", `Failed to configure ${kind} ${id} (HTTP ${status})`, kind, status, body)
    this.resourceId = id
  }
}

export class ReadError extends HttpResponseError {
  constructor(kind: ResourceKind, target: string, status: number, body: string) {
    super("READ", `Failed to read ${kind} ${target} (HTTP ${status})`, kind, status, body)
  }
}

export class RetriesExhaustedError extends ProvisionError {
  readonly attempts: number
  readonly lastConflict: RevisionConflictError

  constructor(attempts: number, lastConflict: RevisionConflictError) {
    super(
      "RETRIES_EXHAUSTED",
      `Exceeded retries: revision still stale after ${attempts} attempts (${lastConflict.message})`
    )
    this.attempts = attempts
    this.lastConflict = lastConflict
  }
}

export class DependencyMissingError extends ProvisionError {
  readonly step: string
  readonly missing: string[]

  constructor(step: string, missing: string[]) {
    super("DEPENDENCY_MISSING", `Skipping ${step}: prerequisite not available (${missing.join(", ")})`)
    this.step = step
    this.missing = missing
  }
}

export class TopologyError extends ProvisionError {
  readonly issues: string[]

  constructor(source: string, issues: string[]) {
    super("TOPOLOGY", `Invalid topology ${source}:\n${issues.map(i => `  - ${i}`).join("\n")}`)
    this.issues = issues
  }
}

export class PreflightError extends ProvisionError {
  constructor(message: string) {
    super("PREFLIGHT", message)
  }
}

export class TransportError extends ProvisionError {
  readonly method: string
  readonly url: string

  constructor(method: string, url: string, cause: unknown) {
    super("TRANSPORT", `${method} ${url} failed: ${describeError(cause)}`)
    this.method = method
    this.url = url
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function extractValidationErrors(body: string): string[] {
  try {
    const parsed: unknown = JSON.parse(body)
    if (!isRecord(parsed) || !isRecord(parsed.component)) return []
    const errors = parsed.component.validationErrors
    return Array.isArray(errors) ? errors.filter((e): e is string => typeof e === "string") : []
  } catch {
    return []
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
