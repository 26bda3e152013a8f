/**
 * Readiness Gate
 *
 * Polls a health probe on a fixed interval until it passes or the attempt
 * budget runs out. Nothing else may talk to NiFi before this returns.
 *
 * @purpose Bounded wait for the flow engine to come up
 */

import { TimeoutError, describeError } from "./errors.js"
import { sleep as defaultSleep } from "./revision-retry.js"

export type ReadinessProbe = () => Promise<boolean>

export interface ReadinessOptions {
  maxAttempts?: number
  intervalMs?: number
  /** Skip probing entirely (dry run). */
  bypass?: boolean
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  onAttempt?: (attempt: number, maxAttempts: number) => void
}

export type ReadinessResult =
  | { status: "ready"; attempts: number; elapsedMs: number }
  | { status: "bypassed" }

export const DEFAULT_READY_ATTEMPTS = 60
export const DEFAULT_READY_INTERVAL_MS = 5000

export async function waitUntilReady(
  probe: ReadinessProbe,
  options: ReadinessOptions = {}
): Promise<ReadinessResult> {
  if (options.bypass) {
    return { status: "bypassed" }
  }

  const maxAttempts = options.maxAttempts ?? DEFAULT_READY_ATTEMPTS
  const intervalMs = options.intervalMs ?? DEFAULT_READY_INTERVAL_MS
  const wait = options.sleep ?? defaultSleep
  const now = options.now ?? Date.now
  const startedAt = now()

  let lastError: string | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    options.onAttempt?.(attempt, maxAttempts)

    let ready = false
    try {
      ready = await probe()
    } catch (error) {
      // A throwing probe counts as "not ready yet"
      lastError = describeError(error)
    }

    if (ready) {
      return { status: "ready", attempts: attempt, elapsedMs: now() - startedAt }
    }
    if (attempt < maxAttempts) {
      await wait(intervalMs)
    }
  }

  throw new TimeoutError(maxAttempts, now() - startedAt, lastError)
}
