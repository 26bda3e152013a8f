import {
  connectionComponent,
  controllerServiceComponent,
  parameterContextAssignment,
  parameterContextComponent,
  processGroupComponent,
  processorConfigComponent,
  resolveProperties,
} from '../payloads.js'
import { DependencyMissingError } from '../errors.js'
import { realId, type ResourceId } from '../resource-id.js'
import type { ConnectionSpec, ProcessorSpec } from '../../types/topology.js'

const PROCESSOR: ProcessorSpec = {
  key: 'poll',
  name: 'Poll Outbox Table',
  type: 'org.apache.nifi.processors.standard.QueryDatabaseTable',
  position: { x: 100, y: 100 },
  properties: {
    'Database Connection Pooling Service': { ref: 'dbcp' },
    'Table Name': 'outbox',
    'Max Rows Per Flow File': 100,
  },
  scheduling: { period: '5 sec', strategy: 'TIMER_DRIVEN', executionNode: 'PRIMARY', concurrentTasks: 1, runDurationMillis: 0 },
  penaltyDuration: '30 sec',
  yieldDuration: '1 sec',
  bulletinLevel: 'WARN',
  autoTerminate: ['failure'],
}

const CONNECTION: ConnectionSpec = {
  key: 'a-[success]->b',
  name: 'A -[success]-> B',
  source: 'a',
  destination: 'b',
  relationship: 'success',
  backPressureObjectThreshold: 10000,
  backPressureDataSizeThreshold: '1 GB',
  flowFileExpiration: '0 sec',
}

function ids(entries: Record<string, string>): Map<string, ResourceId> {
  return new Map(Object.entries(entries).map(([key, value]) => [key, realId(value)]))
}

describe('resolveProperties', () => {
  it('swaps references for ids and stringifies scalars', () => {
    expect(
      resolveProperties('X', { pool: { ref: 'dbcp' }, rows: 100, enabled: true, name: 'outbox' }, ids({ dbcp: 'svc-1' }))
    ).toEqual({ pool: 'svc-1', rows: '100', enabled: 'true', name: 'outbox' })
  })

  it('names every unresolved reference', () => {
    let error: unknown
    try {
      resolveProperties('X', { reader: { ref: 'avroReader' }, writer: { ref: 'jsonWriter' } }, ids({}))
    } catch (e) {
      error = e
    }

    expect(error).toBeInstanceOf(DependencyMissingError)
    expect(error).toMatchObject({ missing: ['avroReader', 'jsonWriter'] })
    expect(error).toHaveProperty('message', "Skipping 'X': prerequisite not available (avroReader, jsonWriter)")
  })
})

describe('processGroupComponent', () => {
  it('includes comments only when set', () => {
    expect(processGroupComponent({ name: 'P', position: { x: 1, y: 2 } })).toEqual({ name: 'P', position: { x: 1, y: 2 } })
    expect(processGroupComponent({ name: 'P', position: { x: 1, y: 2 }, comments: 'c' })).toHaveProperty('comments', 'c')
  })
})

describe('parameterContextComponent', () => {
  it('wraps each parameter and keeps the sensitive flag', () => {
    const component = parameterContextComponent({
      name: 'Outbox-DB',
      parameters: [
        { name: 'DB_HOST', value: 'db.test', sensitive: false, description: 'Host' },
        { name: 'DB_PASSWORD', value: 'test-secret', sensitive: true },
      ],
    })

    expect(component).toEqual({
      name: 'Outbox-DB',
      parameters: [
        { parameter: { name: 'DB_HOST', value: 'db.test', sensitive: false, description: 'Host' } },
        { parameter: { name: 'DB_PASSWORD', value: 'test-secret', sensitive: true } },
      ],
    })
  })

  it('assigns a context by id', () => {
    expect(parameterContextAssignment(realId('ctx-1'))).toEqual({ parameterContext: { id: 'ctx-1' } })
  })
})

describe('controllerServiceComponent', () => {
  it('resolves properties against other services', () => {
    const component = controllerServiceComponent(
      { key: 'writer', name: 'Writer', type: 'org.example.Writer', properties: { schema: { ref: 'registry' } }, enable: true },
      ids({ registry: 'svc-9' })
    )

    expect(component).toEqual({ name: 'Writer', type: 'org.example.Writer', properties: { schema: 'svc-9' } })
  })
})

describe('processorConfigComponent', () => {
  it('maps scheduling and relationships into the config block', () => {
    expect(processorConfigComponent(PROCESSOR, ids({ dbcp: 'svc-1' }))).toEqual({
      config: {
        properties: {
          'Database Connection Pooling Service': 'svc-1',
          'Table Name': 'outbox',
          'Max Rows Per Flow File': '100',
        },
        schedulingPeriod: '5 sec',
        schedulingStrategy: 'TIMER_DRIVEN',
        executionNode: 'PRIMARY',
        penaltyDuration: '30 sec',
        yieldDuration: '1 sec',
        bulletinLevel: 'WARN',
        runDurationMillis: 0,
        concurrentlySchedulableTaskCount: 1,
        autoTerminatedRelationships: ['failure'],
      },
    })
  })

  it('refuses to build a config with a missing service id', () => {
    expect(() => processorConfigComponent(PROCESSOR, ids({}))).toThrow(
      "Skipping 'Poll Outbox Table': prerequisite not available (dbcp)"
    )
  })
})

describe('connectionComponent', () => {
  it('connects two processors in the same group', () => {
    const component = connectionComponent(CONNECTION, realId('pg-1'), ids({ a: 'proc-1', b: 'proc-2' }))

    expect(component).toEqual({
      name: 'A -[success]-> B',
      source: { id: 'proc-1', type: 'PROCESSOR', groupId: 'pg-1' },
      destination: { id: 'proc-2', type: 'PROCESSOR', groupId: 'pg-1' },
      selectedRelationships: ['success'],
      flowFileExpiration: '0 sec',
      backPressureObjectThreshold: '10000',
      backPressureDataSizeThreshold: '1 GB',
      loadBalanceStrategy: 'DO_NOT_LOAD_BALANCE',
      loadBalanceCompression: 'DO_NOT_COMPRESS',
    })
  })

  it('refuses to connect a missing endpoint', () => {
    expect(() => connectionComponent(CONNECTION, realId('pg-1'), ids({ b: 'proc-2' }))).toThrow(
      "Skipping 'A -[success]-> B': prerequisite not available (a)"
    )
  })
})
