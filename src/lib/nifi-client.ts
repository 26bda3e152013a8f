/**
 * NiFi REST Client
 *
 * Thin wrapper over the engine's revisioned object model. Reads return the
 * current revision; writes must present it; a stale one is rejected and
 * surfaced as RevisionConflictError for the retry loop to handle.
 *
 * In dry-run mode no request leaves the process: auth returns a fixed token,
 * lookups report nothing, creates hand back synthetic ids and writes succeed.
 *
 * @purpose Authenticated, optimistic-concurrency HTTP access to NiFi resources
 */

import * as https from "https"
import axios, { type AxiosAdapter, type AxiosInstance, type Method } from "axios"
import type {
  ComponentByKind,
  Entity,
  ResourceKind,
  Revision,
  RunStatusRequest,
  UpdateRequest,
} from "../types/nifi.js"
import type { Logger } from "./logger.js"
import { type ResourceId, realId, syntheticId } from "./resource-id.js"
import { classifyWriteFailure } from "./revision-retry.js"
import {
  AuthenticationError,
  ConfigurationError,
  CreateError,
  NotFoundError,
  ReadError,
  RevisionConflictError,
  TransportError,
  isRecord,
} from "./errors.js"

// ============================================================================
// Types
// ============================================================================

export interface Credentials {
  username: string
  password: string
}

/** `null` scope means controller level (parameter contexts live there). */
export type Scope = ResourceId | null

export type ResourceUpdate =
  | { type: "component"; component: ComponentByKind[ResourceKind] }
  | { type: "run-status"; state: "ENABLED" | "DISABLED" }

export interface FetchedResource {
  id: ResourceId
  revision: Revision
  component: Record<string, unknown>
}

export interface CreatedResource {
  id: ResourceId
  revision: Revision
}

/** The surface the retry loop and convergence engine depend on. */
export interface RevisionedClient {
  readonly dryRun: boolean
  fetchResource(kind: ResourceKind, id: ResourceId): Promise<FetchedResource>
  writeResource(kind: ResourceKind, id: ResourceId, revision: Revision, update: ResourceUpdate): Promise<Revision>
  findResourceByName(kind: ResourceKind, scope: Scope, name: string): Promise<ResourceId | undefined>
  createResource<K extends ResourceKind>(
    kind: K,
    scope: Scope,
    name: string,
    component: ComponentByKind[K]
  ): Promise<CreatedResource>
  getRootGroupId(): Promise<ResourceId>
}

export interface NifiClientOptions {
  baseUrl: string
  dryRun: boolean
  logger: Logger
  timeoutMs?: number
  tlsVerify?: boolean
  /** Swap the HTTP transport; tests plug an in-process server in here. */
  adapter?: AxiosAdapter
}

interface RawResponse {
  status: number
  data: unknown
  text: string
}

export const DRY_RUN_TOKEN = "DRY_RUN_TOKEN"
export const DRY_RUN_ROOT_ID: ResourceId = { kind: "synthetic", value: "dry-root" }
const API_PREFIX = "/nifi-api"

// ============================================================================
// Endpoints
// ============================================================================

interface KindEndpoints {
  list: (scope: string | null) => string
  listKey: string
  create: (scope: string | null) => string
  item: (id: string) => string
}

function requireScope(kind: ResourceKind, scope: string | null): string {
  if (scope === null) {
    throw new Error(`${kind} requires a process group scope`)
  }
  return scope
}

const ENDPOINTS: Record<ResourceKind, KindEndpoints> = {
  ProcessGroup: {
    list: (scope) => `/flow/process-groups/${requireScope("ProcessGroup", scope)}`,
    listKey: "processGroups",
    create: (scope) => `/process-groups/${requireScope("ProcessGroup", scope)}/process-groups`,
    item: (id) => `/process-groups/${id}`,
  },
  ParameterContext: {
    list: () => "/flow/parameter-contexts",
    listKey: "parameterContexts",
    create: () => "/parameter-contexts",
    item: (id) => `/parameter-contexts/${id}`,
  },
  ControllerService: {
    list: (scope) => `/flow/process-groups/${requireScope("ControllerService", scope)}/controller-services`,
    listKey: "controllerServices",
    create: (scope) => `/process-groups/${requireScope("ControllerService", scope)}/controller-services`,
    item: (id) => `/controller-services/${id}`,
  },
  Processor: {
    list: (scope) => `/process-groups/${requireScope("Processor", scope)}/processors`,
    listKey: "processors",
    create: (scope) => `/process-groups/${requireScope("Processor", scope)}/processors`,
    item: (id) => `/processors/${id}`,
  },
  Connection: {
    list: (scope) => `/process-groups/${requireScope("Connection", scope)}/connections`,
    listKey: "connections",
    create: (scope) => `/process-groups/${requireScope("Connection", scope)}/connections`,
    item: (id) => `/connections/${id}`,
  },
}

export function endpointsFor(kind: ResourceKind): KindEndpoints {
  return ENDPOINTS[kind]
}

// ============================================================================
// Client
// ============================================================================

export class NifiClient implements RevisionedClient {
  readonly dryRun: boolean
  private http: AxiosInstance
  private logger: Logger
  private token: string | null = null

  constructor(options: NifiClientOptions) {
    this.dryRun = options.dryRun
    this.logger = options.logger
    this.http = axios.create({
      baseURL: `${options.baseUrl.replace(/\/+$/, "")}${API_PREFIX}`,
      timeout: options.timeoutMs ?? 30000,
      httpsAgent: new https.Agent({ rejectUnauthorized: options.tlsVerify ?? false }),
      validateStatus: () => true,
      adapter: options.adapter,
    })
  }

  /** Unauthenticated health probe; never throws. */
  async probeReady(): Promise<boolean> {
    if (this.dryRun) return true
    try {
      const res = await this.request("GET", "/system-about", undefined, { auth: false })
      return res.status >= 200 && res.status < 300
    } catch {
      return false
    }
  }

  async authenticate(credentials: Credentials): Promise<string> {
    if (this.dryRun) {
      this.token = DRY_RUN_TOKEN
      this.logger.dryRun("Skipping authentication (using synthetic token)")
      return this.token
    }

    const form = new URLSearchParams({
      username: credentials.username,
      password: credentials.password,
    }).toString()

    const res = await this.request("POST", "/access/token", form, {
      auth: false,
      contentType: "application/x-www-form-urlencoded",
      responseType: "text",
    })

    const token = res.text.trim()
    if (res.status < 200 || res.status >= 300) {
      throw new AuthenticationError(`Authentication rejected (HTTP ${res.status}): ${token || "<empty body>"}`)
    }
    if (!token) {
      throw new AuthenticationError("Authentication returned an empty token")
    }

    this.token = token
    return token
  }

  async getRootGroupId(): Promise<ResourceId> {
    if (this.dryRun) return DRY_RUN_ROOT_ID

    const res = await this.request("GET", "/flow/process-groups/root")
    if (res.status !== 200) {
      throw new ReadError("ProcessGroup", "root", res.status, res.text)
    }
    const flow = isRecord(res.data) ? res.data.processGroupFlow : undefined
    const id = isRecord(flow) ? flow.id : undefined
    if (typeof id !== "string" || id === "") {
      throw new NotFoundError("RootProcessGroup", "root")
    }
    return realId(id)
  }

  async findResourceByName(kind: ResourceKind, scope: Scope, name: string): Promise<ResourceId | undefined> {
    if (this.dryRun) {
      // No remote state exists to find in a dry run
      this.logger.debug(`[DRY RUN] ${kind} '${name}' treated as absent`)
      return undefined
    }

    const scopeId = this.scopeValue(scope)
    const endpoints = ENDPOINTS[kind]
    const res = await this.request("GET", endpoints.list(scopeId))
    if (res.status !== 200) {
      throw new ReadError(kind, `list in ${scopeId ?? "controller"}`, res.status, res.text)
    }

    for (const entity of listEntities(res.data, kind, endpoints.listKey)) {
      const component = isRecord(entity.component) ? entity.component : {}
      if (component.name !== name) continue
      // Controller service listings include services inherited from ancestors
      if (kind === "ControllerService" && scopeId !== null && component.parentGroupId !== scopeId) continue
      const id = typeof entity.id === "string" ? entity.id : component.id
      if (typeof id === "string" && id !== "") return realId(id)
    }
    return undefined
  }

  async createResource<K extends ResourceKind>(
    kind: K,
    scope: Scope,
    name: string,
    component: ComponentByKind[K]
  ): Promise<CreatedResource> {
    if (this.dryRun) {
      const id = syntheticId(kind, name)
      this.logger.dryRun(`Would create ${kind} '${name}' -> ${id.value}`)
      this.logger.debug(JSON.stringify(component, null, 2))
      return { id, revision: { version: 0 } }
    }

    const scopeId = this.scopeValue(scope)
    const res = await this.request("POST", ENDPOINTS[kind].create(scopeId), {
      revision: { version: 0 },
      component,
    })

    if (res.status !== 200 && res.status !== 201) {
      throw new CreateError(kind, name, res.status, res.text)
    }
    const entity = parseEntity(res.data)
    if (!entity.id) {
      throw new CreateError(kind, name, res.status, res.text)
    }
    return { id: realId(entity.id), revision: entity.revision ?? { version: 0 } }
  }

  async fetchResource(kind: ResourceKind, id: ResourceId): Promise<FetchedResource> {
    if (this.dryRun) {
      return { id, revision: { version: 0 }, component: {} }
    }

    const targetId = this.realValue(kind, id)
    const res = await this.request("GET", ENDPOINTS[kind].item(targetId))
    if (res.status === 404) {
      throw new NotFoundError(kind, targetId)
    }
    if (res.status !== 200) {
      throw new ReadError(kind, targetId, res.status, res.text)
    }

    const entity = parseEntity(res.data)
    if (!entity.id) {
      throw new NotFoundError(kind, targetId)
    }
    if (!entity.revision) {
      throw new ReadError(kind, targetId, res.status, res.text)
    }
    return {
      id: realId(entity.id),
      revision: entity.revision,
      component: isRecord(entity.component) ? entity.component : {},
    }
  }

  async writeResource(
    kind: ResourceKind,
    id: ResourceId,
    revision: Revision,
    update: ResourceUpdate
  ): Promise<Revision> {
    if (this.dryRun) {
      return { ...revision, version: revision.version + 1 }
    }

    const targetId = this.realValue(kind, id)
    const submitted: Revision = revision.clientId
      ? { version: revision.version, clientId: revision.clientId }
      : { version: revision.version }

    let path = ENDPOINTS[kind].item(targetId)
    let body: UpdateRequest | RunStatusRequest
    if (update.type === "run-status") {
      path = `${path}/run-status`
      body = { revision: submitted, state: update.state }
    } else {
      body = { revision: submitted, component: { ...update.component, id: targetId } }
    }

    const res = await this.request("PUT", path, body)
    if (res.status === 200) {
      const entity = parseEntity(res.data)
      return entity.revision ?? { ...submitted, version: submitted.version + 1 }
    }

    if (classifyWriteFailure(res.status, res.text) === "retryable") {
      throw new RevisionConflictError(kind, targetId, res.status, res.text)
    }
    throw new ConfigurationError(kind, targetId, res.status, res.text)
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private scopeValue(scope: Scope): string | null {
    if (scope === null) return null
    return scope.value
  }

  private realValue(kind: ResourceKind, id: ResourceId): string {
    if (id.kind === "synthetic") {
      // A synthetic id can only come from a dry run; the server never saw it
      throw new NotFoundError(kind, id.value)
    }
    return id.value
  }

  private async request(
    method: Method,
    path: string,
    body?: unknown,
    options: { auth?: boolean; contentType?: string; responseType?: "json" | "text" } = {}
  ): Promise<RawResponse> {
    const headers: Record<string, string> = {}
    if (options.auth !== false && this.token) {
      headers["Authorization"] = `Bearer ${this.token}`
    }
    if (body !== undefined) {
      headers["Content-Type"] = options.contentType ?? "application/json"
    }

    this.logger.debug(`→ ${method} ${API_PREFIX}${path}`)

    try {
      const res = await this.http.request<unknown>({
        method,
        url: path,
        data: body,
        headers,
        responseType: options.responseType ?? "json",
      })
      const text = typeof res.data === "string" ? res.data : res.data === undefined ? "" : JSON.stringify(res.data)
      this.logger.debug(`← ${res.status} ${method} ${API_PREFIX}${path}`)
      return { status: res.status, data: res.data, text }
    } catch (error) {
      throw new TransportError(method, `${API_PREFIX}${path}`, error)
    }
  }
}

// ============================================================================
// Response parsing
// ============================================================================

function parseEntity(data: unknown): Entity<Record<string, unknown>> {
  if (!isRecord(data)) return {}
  const id = typeof data.id === "string" && data.id !== "" ? data.id : null
  const rev = data.revision
  let revision: Revision | undefined
  if (isRecord(rev) && typeof rev.version === "number") {
    revision = typeof rev.clientId === "string" && rev.clientId !== ""
      ? { version: rev.version, clientId: rev.clientId }
      : { version: rev.version }
  }
  const component = isRecord(data.component) ? data.component : undefined
  return { id, revision, component }
}

function listEntities(data: unknown, kind: ResourceKind, listKey: string): Array<Record<string, unknown>> {
  if (!isRecord(data)) return []
  let list: unknown
  if (kind === "ProcessGroup") {
    const flow = isRecord(data.processGroupFlow) ? data.processGroupFlow.flow : undefined
    list = isRecord(flow) ? flow.processGroups : undefined
  } else {
    list = data[listKey]
  }
  return Array.isArray(list) ? list.filter(isRecord) : []
}
