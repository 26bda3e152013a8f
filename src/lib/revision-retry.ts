/**
 * Revision Retry
 *
 * Wraps one configuration write in a bounded fetch-then-write loop. A stale
 * revision is the only failure worth retrying: it means someone else wrote
 * between our read and our write. Everything else is final.
 *
 * @purpose Optimistic-concurrency retry loop for revisioned NiFi writes
 */

import type { ResourceKind, Revision } from "../types/nifi.js"
import type { ResourceId } from "./resource-id.js"
import type { Logger } from "./logger.js"
import type { ResourceUpdate, RevisionedClient } from "./nifi-client.js"
import {
  ConfigurationError,
  RetriesExhaustedError,
  RevisionConflictError,
} from "./errors.js"

// ============================================================================
// Classification
// ============================================================================

export type WriteFailureClass = "retryable" | "fatal"

const STALE_REVISION = /not the most up-to-date revision/i

/**
 * Decide whether a rejected write may be retried against a fresh revision.
 * NiFi reports a stale revision as 409, or as 400 with this message.
 */
export function classifyWriteFailure(status: number, body: string): WriteFailureClass {
  if (status === 409) return "retryable"
  if (STALE_REVISION.test(body)) return "retryable"
  return "fatal"
}

// ============================================================================
// Retry loop
// ============================================================================

export type RetryOutcome =
  | { ok: true; attempts: number; revision: Revision }
  | { ok: false; reason: "rejected"; attempts: number; error: ConfigurationError }
  | { ok: false; reason: "exhausted"; attempts: number; error: RetriesExhaustedError }

export interface RetryOptions {
  maxAttempts?: number
  delayMs?: number
  /** Human label for log lines, e.g. `Processor 'Read CDC Slot'`. */
  label?: string
  sleep?: (ms: number) => Promise<void>
}

export const DEFAULT_WRITE_ATTEMPTS = 5
export const DEFAULT_RETRY_DELAY_MS = 1000

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Fetch the current revision, write, and repeat on a stale revision up to
 * `maxAttempts` writes. The revision is re-read before every attempt and never
 * reused. Errors other than a rejected write (not found, transport) propagate.
 */
export async function configureWithRetry(
  client: RevisionedClient,
  logger: Logger,
  kind: ResourceKind,
  id: ResourceId,
  update: ResourceUpdate,
  options: RetryOptions = {}
): Promise<RetryOutcome> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_WRITE_ATTEMPTS
  const delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS
  const wait = options.sleep ?? sleep
  const label = options.label ?? `${kind} ${id.value}`

  if (client.dryRun) {
    logger.dryRun(`Would configure ${label} (${describeUpdate(update)})`)
    logger.debug(JSON.stringify(update, null, 2))
    return { ok: true, attempts: 0, revision: { version: 0 } }
  }

  let lastConflict: RevisionConflictError | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const current = await client.fetchResource(kind, id)

    try {
      const revision = await client.writeResource(kind, id, current.revision, update)
      logger.debug(`${label}: write accepted at version ${revision.version} (attempt ${attempt})`)
      return { ok: true, attempts: attempt, revision }
    } catch (error) {
      if (error instanceof RevisionConflictError) {
        lastConflict = error
        logger.warn(`Revision conflict for ${label}; retrying (${attempt}/${maxAttempts})...`)
        if (attempt < maxAttempts) {
          await wait(delayMs)
        }
        continue
      }
      if (error instanceof ConfigurationError) {
        return { ok: false, reason: "rejected", attempts: attempt, error }
      }
      throw error
    }
  }

  // Only reachable after at least one conflict, so lastConflict is set
  const conflict = lastConflict ?? new RevisionConflictError(kind, id.value, 409, "")
  return {
    ok: false,
    reason: "exhausted",
    attempts: maxAttempts,
    error: new RetriesExhaustedError(maxAttempts, conflict),
  }
}

function describeUpdate(update: ResourceUpdate): string {
  return update.type === "run-status" ? `state ${update.state}` : "component configuration"
}
