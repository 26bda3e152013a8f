/**
 * Database Preflight
 *
 * Checks what a topology needs from PostgreSQL before any flow resource is
 * touched: required tables and the logical replication slot.
 *
 * @purpose Verify (and optionally prepare) the source database for a topology
 */

import { Client } from "pg"
import type { PreflightSpec } from "../types/topology.js"
import type { PostgresSettings } from "../utils/env-config.js"
import type { Logger } from "./logger.js"
import { PreflightError, describeError } from "./errors.js"

// ============================================================================
// Probe
// ============================================================================

export interface DatabaseProbe {
  tableExists(qualifiedName: string): Promise<boolean>
  replicationSlotExists(slot: string): Promise<boolean>
  createReplicationSlot(slot: string, plugin: string): Promise<void>
  close(): Promise<void>
}

export class PgDatabaseProbe implements DatabaseProbe {
  private client: Client
  private connecting: Promise<void> | null = null
  private open = false

  constructor(settings: PostgresSettings) {
    this.client = new Client({
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: settings.user,
      password: settings.password,
      connectionTimeoutMillis: 10_000,
    })
  }

  async tableExists(qualifiedName: string): Promise<boolean> {
    const rows = await this.query<{ present: boolean }>(
      "SELECT to_regclass($1) IS NOT NULL AS present",
      [qualifiedName]
    )
    return rows[0]?.present === true
  }

  async replicationSlotExists(slot: string): Promise<boolean> {
    const rows = await this.query<{ slot_name: string }>(
      "SELECT slot_name FROM pg_replication_slots WHERE slot_name = $1",
      [slot]
    )
    return rows.length > 0
  }

  async createReplicationSlot(slot: string, plugin: string): Promise<void> {
    await this.query("SELECT pg_create_logical_replication_slot($1, $2)", [slot, plugin])
  }

  /** Ends the session only if connect() actually succeeded. */
  async close(): Promise<void> {
    this.connecting = null
    if (!this.open) return
    this.open = false
    await this.client.end()
  }

  private async query<R extends Record<string, unknown>>(sql: string, params: unknown[]): Promise<R[]> {
    if (!this.connecting) {
      this.connecting = this.client.connect().then(() => {
        this.open = true
      })
    }
    await this.connecting
    const result = await this.client.query<R>(sql, params)
    return result.rows
  }
}

// ============================================================================
// Checks
// ============================================================================

export interface DbPreflightOptions {
  /** Create a missing replication slot instead of only warning. */
  createSlot?: boolean
}

export type DbPreflightResult =
  | { status: "passed"; createdSlot: boolean }
  | { status: "unverified"; reason: string }

export function slotCreationSql(slot: string, plugin: string): string {
  return `SELECT pg_create_logical_replication_slot('${slot}', '${plugin}');`
}

/**
 * Missing tables are fatal. A missing slot only warns unless `createSlot`.
 * If the database cannot be reached at all the run goes on unverified.
 */
export async function runDbPreflight(
  spec: PreflightSpec,
  probe: DatabaseProbe,
  logger: Logger,
  options: DbPreflightOptions = {}
): Promise<DbPreflightResult> {
  const missingTables: string[] = []
  let createdSlot = false

  try {
    for (const table of spec.tables) {
      if (await probe.tableExists(table)) {
        logger.success(`Table ${table} exists`)
      } else {
        missingTables.push(table)
      }
    }

    const slot = spec.replicationSlot
    if (slot) {
      if (await probe.replicationSlotExists(slot.name)) {
        logger.success(`Replication slot '${slot.name}' exists`)
      } else if (options.createSlot) {
        logger.info(`Creating replication slot '${slot.name}' (${slot.plugin})...`)
        await probe.createReplicationSlot(slot.name, slot.plugin)
        createdSlot = true
        logger.success(`Replication slot '${slot.name}' created`)
      } else {
        logger.warn(`Replication slot '${slot.name}' not found. Create it with:`)
        logger.warn(`  ${slotCreationSql(slot.name, slot.plugin)}`)
      }
    }
  } catch (error) {
    const reason = describeError(error)
    logger.warn(`Could not verify database prerequisites: ${reason}`)
    return { status: "unverified", reason }
  } finally {
    await probe.close()
  }

  if (missingTables.length > 0) {
    throw new PreflightError(`Required table(s) missing: ${missingTables.join(", ")}`)
  }
  return { status: "passed", createdSlot }
}
