import { runDbPreflight, slotCreationSql } from '../db-preflight.js'
import { PreflightError } from '../errors.js'
import { createMemoryLogger } from '../logger.js'
import type { PreflightSpec } from '../../types/topology.js'
import { MemoryDatabase } from './helpers/memory-database.js'

const OUTBOX: PreflightSpec = { tables: ['public.outbox'] }
const CDC: PreflightSpec = { tables: [], replicationSlot: { name: 'nifi_cdc_slot', plugin: 'test_decoding' } }

function linesAt(logger: ReturnType<typeof createMemoryLogger>, level: string): string[] {
  return logger.lines.filter(l => l.level === level).map(l => l.message)
}

describe('runDbPreflight', () => {
  it('passes when every required table exists', async () => {
    const db = new MemoryDatabase({ tables: ['public.outbox'] })
    const logger = createMemoryLogger()

    const result = await runDbPreflight(OUTBOX, db, logger)

    expect(result).toEqual({ status: 'passed', createdSlot: false })
    expect(linesAt(logger, 'success')).toEqual(['Table public.outbox exists'])
    expect(db.closed).toBe(true)
  })

  it('fails on a missing table and still closes the connection', async () => {
    const db = new MemoryDatabase()

    const attempt = runDbPreflight(OUTBOX, db, createMemoryLogger())

    await expect(attempt).rejects.toThrow(PreflightError)
    await expect(attempt).rejects.toThrow('Required table(s) missing: public.outbox')
    expect(db.closed).toBe(true)
  })

  it('warns with the creation command when the slot is missing', async () => {
    const db = new MemoryDatabase()
    const logger = createMemoryLogger()

    const result = await runDbPreflight(CDC, db, logger)

    expect(result).toEqual({ status: 'passed', createdSlot: false })
    expect(linesAt(logger, 'warn')).toEqual([
      "Replication slot 'nifi_cdc_slot' not found. Create it with:",
      "  SELECT pg_create_logical_replication_slot('nifi_cdc_slot', 'test_decoding');",
    ])
    expect(db.slots.size).toBe(0)
  })

  it('creates the slot when asked to', async () => {
    const db = new MemoryDatabase()
    const logger = createMemoryLogger()

    const result = await runDbPreflight(CDC, db, logger, { createSlot: true })

    expect(result).toEqual({ status: 'passed', createdSlot: true })
    expect(db.slots.has('nifi_cdc_slot')).toBe(true)
    expect(linesAt(logger, 'success')).toEqual(["Replication slot 'nifi_cdc_slot' created"])
  })

  it('leaves an existing slot alone', async () => {
    const db = new MemoryDatabase({ slots: ['nifi_cdc_slot'] })
    const logger = createMemoryLogger()

    const result = await runDbPreflight(CDC, db, logger, { createSlot: true })

    expect(result).toEqual({ status: 'passed', createdSlot: false })
    expect(linesAt(logger, 'success')).toEqual(["Replication slot 'nifi_cdc_slot' exists"])
  })

  it('carries on unverified when the database cannot be reached', async () => {
    const db = new MemoryDatabase()
    db.unreachable = new Error('connect ECONNREFUSED 127.0.0.1:5432')
    const logger = createMemoryLogger()

    const result = await runDbPreflight(OUTBOX, db, logger)

    expect(result).toEqual({ status: 'unverified', reason: 'connect ECONNREFUSED 127.0.0.1:5432' })
    expect(linesAt(logger, 'warn')).toEqual([
      'Could not verify database prerequisites: connect ECONNREFUSED 127.0.0.1:5432',
    ])
    expect(db.closed).toBe(true)
  })
})

describe('slotCreationSql', () => {
  it('renders a copy-pasteable statement', () => {
    expect(slotCreationSql('s', 'pgoutput')).toBe("SELECT pg_create_logical_replication_slot('s', 'pgoutput');")
  })
})
