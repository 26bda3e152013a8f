/**
 * Environment Configuration
 *
 * Reads the .env file once at startup and turns it into an immutable
 * AppConfig. Nothing below the command layer touches process.env.
 *
 * @purpose Load and validate NiFi and PostgreSQL settings from the environment
 */

import * as fs from "fs"
import * as path from "path"
import { parse as parseDotenv } from "dotenv"
import { ConfigError } from "../lib/errors.js"

// ============================================================================
// Types
// ============================================================================

export interface NifiSettings {
  baseUrl: string
  username: string
  password: string
  tlsVerify: boolean
  requestTimeoutMs: number
}

export interface PostgresSettings {
  host: string
  port: number
  database: string
  user: string
  password: string
}

export interface ReadinessSettings {
  maxAttempts: number
  intervalMs: number
}

export interface RetrySettings {
  maxAttempts: number
  delayMs: number
}

export interface AppConfig {
  readonly nifi: Readonly<NifiSettings>
  readonly postgres: Readonly<PostgresSettings>
  readonly readiness: Readonly<ReadinessSettings>
  readonly retry: Readonly<RetrySettings>
}

export type EnvSource = Record<string, string | undefined>

export const REQUIRED_VARS = [
  "NIFI_HOST",
  "NIFI_PORT",
  "POSTGRES_HOST",
  "POSTGRES_PORT",
  "POSTGRES_DB",
  "POSTGRES_USER",
  "POSTGRES_PASSWORD",
  "NIFI_SINGLE_USER_CREDENTIALS_USERNAME",
  "NIFI_SINGLE_USER_CREDENTIALS_PASSWORD",
] as const

const PLACEHOLDER = /^\[.*\]$/
const NUMERIC = /^[0-9]+$/

// ============================================================================
// Loading
// ============================================================================

/**
 * Read an env file without mutating process.env. Values already present in
 * `base` win over the file, matching dotenv's default precedence.
 */
export function readEnvFile(filePath: string, base: EnvSource = process.env): EnvSource {
  const resolved = path.resolve(filePath)
  if (!fs.existsSync(resolved)) {
    throw new ConfigError([`Environment file not found: ${resolved}`])
  }
  const fromFile = parseDotenv(fs.readFileSync(resolved, "utf-8"))
  const merged: EnvSource = { ...fromFile }
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) merged[key] = value
  }
  return merged
}

export function loadConfig(env: EnvSource): AppConfig {
  const issues: string[] = []
  const missing: string[] = []
  const placeholders: string[] = []

  for (const name of REQUIRED_VARS) {
    const value = env[name]
    if (value === undefined || value === "") {
      missing.push(name)
    } else if (PLACEHOLDER.test(value)) {
      placeholders.push(`${name}=${value}`)
    }
  }

  if (missing.length > 0) {
    issues.push(`Missing required environment variables: ${missing.join(", ")}`)
  }
  for (const p of placeholders) {
    issues.push(`Still has a placeholder value: ${p}`)
  }

  const nifiPort = env.NIFI_PORT ?? ""
  if (nifiPort && !NUMERIC.test(nifiPort)) {
    issues.push(`NIFI_PORT must be numeric (current: ${nifiPort})`)
  }
  const pgPort = env.POSTGRES_PORT ?? ""
  if (pgPort && !NUMERIC.test(pgPort)) {
    issues.push(`POSTGRES_PORT must be numeric (current: ${pgPort})`)
  }

  const scheme = env.NIFI_SCHEME ?? "https"
  if (scheme !== "http" && scheme !== "https") {
    issues.push(`NIFI_SCHEME must be http or https (current: ${scheme})`)
  }

  const readyAttempts = optionalInt(env, "NIFI_READY_MAX_ATTEMPTS", 60, issues)
  const readyInterval = optionalInt(env, "NIFI_READY_INTERVAL_SECONDS", 5, issues)
  const writeAttempts = optionalInt(env, "NIFI_WRITE_MAX_ATTEMPTS", 5, issues)
  const writeDelay = optionalInt(env, "NIFI_WRITE_RETRY_DELAY_MS", 1000, issues)
  const requestTimeout = optionalInt(env, "NIFI_REQUEST_TIMEOUT_MS", 30000, issues)
  const tlsVerify = optionalBool(env, "NIFI_TLS_VERIFY", false, issues)

  if (issues.length > 0) {
    throw new ConfigError(issues)
  }

  return Object.freeze({
    nifi: Object.freeze({
      baseUrl: `${scheme}://${env.NIFI_HOST}:${nifiPort}`,
      username: env.NIFI_SINGLE_USER_CREDENTIALS_USERNAME ?? "",
      password: env.NIFI_SINGLE_USER_CREDENTIALS_PASSWORD ?? "",
      tlsVerify,
      requestTimeoutMs: requestTimeout,
    }),
    postgres: Object.freeze({
      host: env.POSTGRES_HOST ?? "",
      port: parseInt(pgPort, 10),
      database: env.POSTGRES_DB ?? "",
      user: env.POSTGRES_USER ?? "",
      password: env.POSTGRES_PASSWORD ?? "",
    }),
    readiness: Object.freeze({
      maxAttempts: readyAttempts,
      intervalMs: readyInterval * 1000,
    }),
    retry: Object.freeze({
      maxAttempts: writeAttempts,
      delayMs: writeDelay,
    }),
  })
}

export const DEFAULT_ENV_FILE = ".env"

/**
 * Resolve the env file the command layer was pointed at. An explicit path
 * must exist; the default `.env` is optional and process.env alone is used
 * when it is absent.
 */
export function loadConfigFrom(envFile?: string, base: EnvSource = process.env): AppConfig {
  if (envFile) {
    return loadConfig(readEnvFile(envFile, base))
  }
  if (fs.existsSync(path.resolve(DEFAULT_ENV_FILE))) {
    return loadConfig(readEnvFile(DEFAULT_ENV_FILE, base))
  }
  return loadConfig(base)
}

/**
 * Look up a dotted path such as `postgres.host` for `{ setting: ... }`
 * references in topology files.
 */
export function getSetting(config: AppConfig, settingPath: string): string | number | boolean | undefined {
  const [section, key] = settingPath.split(".")
  if (!section || !key) return undefined
  const sections: Record<string, Readonly<object>> = {
    nifi: config.nifi,
    postgres: config.postgres,
    readiness: config.readiness,
    retry: config.retry,
  }
  const group = sections[section]
  if (!group) return undefined
  const value: unknown = Object.entries(group).find(([k]) => k === key)?.[1]
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value
  }
  return undefined
}

// ============================================================================
// Helpers
// ============================================================================

function optionalInt(env: EnvSource, name: string, fallback: number, issues: string[]): number {
  const raw = env[name]
  if (raw === undefined || raw === "") return fallback
  if (!NUMERIC.test(raw) || parseInt(raw, 10) < 1) {
    issues.push(`${name} must be a positive integer (current: ${raw})`)
    return fallback
  }
  return parseInt(raw, 10)
}

function optionalBool(env: EnvSource, name: string, fallback: boolean, issues: string[]): boolean {
  const raw = env[name]
  if (raw === undefined || raw === "") return fallback
  const normalized = raw.toLowerCase()
  if (["1", "true", "yes"].includes(normalized)) return true
  if (["0", "false", "no"].includes(normalized)) return false
  issues.push(`${name} must be true or false (current: ${raw})`)
  return fallback
}
