import { randomUUID } from "node:crypto"
import type { Logger, LogLevelName } from "@kvrest/logger"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application, Middleware } from "./server"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger

  /**
   * Epoch milliseconds, used for lifecycle deadlines.
   * @default Date.now
   */
  now?: () => number
}

export interface EnabledRequestIdConfig {
  enabled: true

  /**
   * Header name to read/write request ID.
   * @default "x-request-id"
   */
  header?: string

  /**
   * Function to generate a new request ID when none is present.
   * @default crypto.randomUUID()
   */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Log level for completed requests. 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /**
   * @default [livenessPath, readinessPath] if health checks are enabled, otherwise []
   */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: number
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  /** @default [] */
  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: number
}

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  /** `0` binds a free port; the handle reports the bound one. */
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default 2_147_483_647 (max timer value, effectively no timeout) */
  startupTimeoutMs?: number

  /** @default 10_000 */
  shutdownTimeoutMs?: number

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  routes: (app: Application) => void

  middleware?: {
    pre?: Middleware[]
    post?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: number
  shutdownTimeoutMs: number
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  routes: (app: Application) => void
  middleware: { pre: Middleware[]; post: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

const MAX_TIMER_MS = 2_147_483_647

interface ServerDefaults {
  host: string
  startupTimeoutMs: number
  shutdownTimeoutMs: number
  requestId: Required<EnabledRequestIdConfig>
  requestLogging: { enabled: true; level: LogLevelName }
  health: Required<EnabledHealthConfig>
}

export const DEFAULTS: ServerDefaults = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    generate: () => randomUUID(),
  },
  requestLogging: {
    enabled: true,
    level: "info",
  },
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealthConfig(options)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestIdConfig(options),
    requestLogging: resolveRequestLoggingConfig(options, health),
    health,
    routes: options.routes,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

export function resolveDependencies(deps: ServerDependencies): Required<ServerDependencies> {
  return { logger: deps.logger, now: deps.now ?? Date.now }
}

function resolveHealthConfig(options: ServerOptions): ResolvedHealthConfig {
  if (options.health?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.health, ...options.health, enabled: true }
}

function resolveRequestIdConfig(options: ServerOptions): ResolvedRequestIdConfig {
  if (options.requestId?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.requestId, ...options.requestId, enabled: true }
}

function resolveRequestLoggingConfig(
  options: ServerOptions,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (options.requestLogging?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: options.requestLogging?.level ?? DEFAULTS.requestLogging.level,
    ignorePaths:
      options.requestLogging?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
