import type { AxiosAdapter } from 'axios'
import { DRY_RUN_TOKEN, NifiClient } from '../nifi-client.js'
import { createMemoryLogger } from '../logger.js'
import {
  AuthenticationError,
  ConfigurationError,
  CreateError,
  NotFoundError,
  RevisionConflictError,
  TransportError,
} from '../errors.js'
import { realId } from '../resource-id.js'
import { connectionComponent } from '../payloads.js'
import { FAKE_ROOT_ID, FAKE_TOKEN, FakeNifi, TEST_BASE_URL, connectedClient } from './helpers/fake-nifi.js'

function clientFor(fake: FakeNifi, dryRun = false): NifiClient {
  return new NifiClient({ baseUrl: TEST_BASE_URL, dryRun, logger: createMemoryLogger(), adapter: fake.adapter })
}

describe('NifiClient', () => {
  let fake: FakeNifi

  beforeEach(() => {
    fake = new FakeNifi()
  })

  describe('probeReady', () => {
    it('reports readiness from /system-about', async () => {
      fake.notReadyProbes = 1
      const client = clientFor(fake)

      expect(await client.probeReady()).toBe(false)
      expect(await client.probeReady()).toBe(true)
    })

    it('reports not ready when the transport fails', async () => {
      const refused: AxiosAdapter = async () => {
        throw new Error('connect ECONNREFUSED')
      }
      const client = new NifiClient({
        baseUrl: TEST_BASE_URL,
        dryRun: false,
        logger: createMemoryLogger(),
        adapter: refused,
      })

      expect(await client.probeReady()).toBe(false)
    })
  })

  describe('authenticate', () => {
    it('posts form-encoded credentials and returns the raw token', async () => {
      const client = clientFor(fake)

      const token = await client.authenticate({ username: 'admin', password: 'test-secret' })

      expect(token).toBe(FAKE_TOKEN)
      expect(fake.requests[0]).toEqual({
        method: 'POST',
        path: '/access/token',
        body: 'username=admin&password=test-secret',
      })
    })

    it('rejects bad credentials', async () => {
      const client = clientFor(fake)

      await expect(client.authenticate({ username: 'admin', password: 'wrong' })).rejects.toThrow(
        AuthenticationError
      )
    })

    it('rejects a successful response with an empty token', async () => {
      fake.emptyToken = true
      const client = clientFor(fake)

      const attempt = client.authenticate({ username: 'admin', password: 'test-secret' })

      await expect(attempt).rejects.toThrow(AuthenticationError)
      await expect(attempt).rejects.toThrow('Authentication returned an empty token')
    })

    it('sends the bearer token on later calls', async () => {
      const client = await connectedClient(fake, createMemoryLogger())

      expect(await client.getRootGroupId()).toEqual(realId(FAKE_ROOT_ID))
    })

    it('returns a synthetic token without a request in dry-run mode', async () => {
      const client = clientFor(fake, true)

      expect(await client.authenticate({ username: 'admin', password: 'test-secret' })).toBe(DRY_RUN_TOKEN)
      expect(fake.requests).toHaveLength(0)
    })
  })

  describe('findResourceByName', () => {
    it('returns the exact-name match in scope', async () => {
      const groupId = fake.seed('ProcessGroup', FAKE_ROOT_ID, { name: 'Orders' })
      fake.seed('ProcessGroup', FAKE_ROOT_ID, { name: 'Orders Archive' })
      const client = await connectedClient(fake, createMemoryLogger())

      expect(await client.findResourceByName('ProcessGroup', realId(FAKE_ROOT_ID), 'Orders')).toEqual(
        realId(groupId)
      )
    })

    it('reports absent rather than failing when nothing matches', async () => {
      const client = await connectedClient(fake, createMemoryLogger())

      expect(await client.findResourceByName('Processor', realId(FAKE_ROOT_ID), 'Missing')).toBeUndefined()
    })

    it('ignores controller services inherited from another group', async () => {
      const groupId = fake.seed('ProcessGroup', FAKE_ROOT_ID, { name: 'Orders' })
      fake.seed('ControllerService', FAKE_ROOT_ID, { name: 'Pool' })
      const client = await connectedClient(fake, createMemoryLogger())

      expect(await client.findResourceByName('ControllerService', realId(groupId), 'Pool')).toBeUndefined()

      const ownId = fake.seed('ControllerService', groupId, { name: 'Pool' })
      expect(await client.findResourceByName('ControllerService', realId(groupId), 'Pool')).toEqual(realId(ownId))
    })

    it('looks parameter contexts up at controller level', async () => {
      const contextId = fake.seed('ParameterContext', null, { name: 'CDC-DB' })
      const client = await connectedClient(fake, createMemoryLogger())

      expect(await client.findResourceByName('ParameterContext', null, 'CDC-DB')).toEqual(realId(contextId))
      expect(fake.requests.at(-1)?.path).toBe('/flow/parameter-contexts')
    })
  })

  describe('createResource', () => {
    it('creates with revision version 0', async () => {
      const client = await connectedClient(fake, createMemoryLogger())

      const created = await client.createResource('ProcessGroup', realId(FAKE_ROOT_ID), 'Orders', {
        name: 'Orders',
        position: { x: 100, y: 100 },
      })

      expect(created.id.kind).toBe('real')
      expect(created.revision).toEqual({ version: 1 })
      expect(fake.requests.at(-1)).toEqual({
        method: 'POST',
        path: `/process-groups/${FAKE_ROOT_ID}/process-groups`,
        body: { revision: { version: 0 }, component: { name: 'Orders', position: { x: 100, y: 100 } } },
      })
    })

    it('raises CreateError with the status and body', async () => {
      fake.failCreate('Broken', 400, 'Processor type is unknown')
      const client = await connectedClient(fake, createMemoryLogger())

      const attempt = client.createResource('Processor', realId(FAKE_ROOT_ID), 'Broken', { name: 'Broken' })

      await expect(attempt).rejects.toThrow(CreateError)
      await expect(attempt).rejects.toMatchObject({ status: 400, body: 'Processor type is unknown' })
    })
  })

  describe('fetchResource', () => {
    it('returns the component and current revision', async () => {
      const id = fake.seed('Processor', FAKE_ROOT_ID, { name: 'A', state: 'STOPPED' })
      const client = await connectedClient(fake, createMemoryLogger())

      const fetched = await client.fetchResource('Processor', realId(id))

      expect(fetched.revision).toEqual({ version: 1 })
      expect(fetched.component.name).toBe('A')
    })

    it('raises NotFoundError when the response carries a null id', async () => {
      const id = fake.seed('Processor', FAKE_ROOT_ID, { name: 'A' })
      fake.idlessReads.add(id)
      const client = await connectedClient(fake, createMemoryLogger())

      const attempt = client.fetchResource('Processor', realId(id))

      await expect(attempt).rejects.toThrow(NotFoundError)
      await expect(attempt).rejects.toThrow(`Processor ${id} not found (response carried no id)`)
    })

    it('raises NotFoundError for an unknown id', async () => {
      const client = await connectedClient(fake, createMemoryLogger())

      await expect(client.fetchResource('Processor', realId('nope'))).rejects.toThrow(NotFoundError)
    })
  })

  describe('writeResource', () => {
    it("returns the server's new revision", async () => {
      const id = fake.seed('Processor', FAKE_ROOT_ID, { name: 'A' })
      const client = await connectedClient(fake, createMemoryLogger())

      const revision = await client.writeResource('Processor', realId(id), { version: 1 }, {
        type: 'component',
        component: { config: { schedulingPeriod: '5 sec' } },
      })

      expect(revision).toEqual({ version: 2 })
      expect(fake.requests.at(-1)?.body).toEqual({
        revision: { version: 1 },
        component: { config: { schedulingPeriod: '5 sec' }, id },
      })
    })

    it('raises RevisionConflictError for a stale version', async () => {
      const id = fake.seed('Processor', FAKE_ROOT_ID, { name: 'A' })
      const client = await connectedClient(fake, createMemoryLogger())

      await expect(
        client.writeResource('Processor', realId(id), { version: 0 }, { type: 'component', component: {} })
      ).rejects.toThrow(RevisionConflictError)
    })

    it('raises ConfigurationError for other rejections', async () => {
      const id = fake.seed('Processor', FAKE_ROOT_ID, { name: 'A' })
      fake.failWrites('A', 400, "'SQL select query' is required")
      const client = await connectedClient(fake, createMemoryLogger())

      await expect(
        client.writeResource('Processor', realId(id), { version: 1 }, { type: 'component', component: {} })
      ).rejects.toThrow(ConfigurationError)
    })

    it('enables a controller service through run-status', async () => {
      const id = fake.seed('ControllerService', FAKE_ROOT_ID, { name: 'Pool', state: 'DISABLED' })
      const client = await connectedClient(fake, createMemoryLogger())

      await client.writeResource('ControllerService', realId(id), { version: 1 }, {
        type: 'run-status',
        state: 'ENABLED',
      })

      expect(fake.requests.at(-1)).toEqual({
        method: 'PUT',
        path: `/controller-services/${id}/run-status`,
        body: { revision: { version: 1 }, state: 'ENABLED' },
      })
      expect(fake.resources.get(id)?.component.state).toBe('ENABLED')
    })
  })

  describe('dry-run', () => {
    it('creates and connects resources without any request', async () => {
      const logger = createMemoryLogger()
      const client = new NifiClient({ baseUrl: TEST_BASE_URL, dryRun: true, logger, adapter: fake.adapter })

      await client.authenticate({ username: 'admin', password: 'test-secret' })
      const root = await client.getRootGroupId()
      const group = await client.createResource('ProcessGroup', root, 'P', { name: 'P' })
      const service = await client.createResource('ControllerService', group.id, 'C', { name: 'C' })
      const a = await client.createResource('Processor', group.id, 'A', { name: 'A' })
      const b = await client.createResource('Processor', group.id, 'B', { name: 'B' })

      const ids = new Map([['a', a.id], ['b', b.id]])
      const component = connectionComponent(
        {
          key: 'a-[success]->b',
          name: 'A -[success]-> B',
          source: 'a',
          destination: 'b',
          relationship: 'success',
          backPressureObjectThreshold: 10000,
          backPressureDataSizeThreshold: '1 GB',
          flowFileExpiration: '0 sec',
        },
        group.id,
        ids
      )
      const connection = await client.createResource('Connection', group.id, 'A -[success]-> B', component)

      expect(fake.requests).toHaveLength(0)
      expect(root.value).toBe('dry-root')
      for (const id of [group.id, service.id, a.id, b.id, connection.id]) {
        expect(id.kind).toBe('synthetic')
      }
      expect(group.id.value).toMatch(/^dry-pg-P-[0-9a-f]{4}$/)
      expect(component.source).toEqual({ id: a.id.value, type: 'PROCESSOR', groupId: group.id.value })
      expect(component.destination).toEqual({ id: b.id.value, type: 'PROCESSOR', groupId: group.id.value })
    })

    it('reports every lookup as absent', async () => {
      fake.seed('ProcessGroup', FAKE_ROOT_ID, { name: 'P' })
      const client = clientFor(fake, true)

      expect(await client.findResourceByName('ProcessGroup', realId(FAKE_ROOT_ID), 'P')).toBeUndefined()
      expect(fake.requests).toHaveLength(0)
    })
  })

  it('wraps transport failures with method and path', async () => {
    const refused: AxiosAdapter = async () => {
      throw new Error('connect ECONNREFUSED')
    }
    const client = new NifiClient({ baseUrl: TEST_BASE_URL, dryRun: false, logger: createMemoryLogger(), adapter: refused })

    const attempt = client.getRootGroupId()

    await expect(attempt).rejects.toThrow(TransportError)
    await expect(attempt).rejects.toThrow('GET /nifi-api/flow/process-groups/root failed: connect ECONNREFUSED')
  })
})
