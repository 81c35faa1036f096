import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@configurator/clock"
import type { Logger, LogLevelName } from "@configurator/logger"
import type { ErrorHandler } from "../errors/create-error-handler"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import { type Application, createApp, type Middleware } from "./server"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /** @default "x-request-id" */
  header?: string

  /** @default crypto.randomUUID() */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level for completed requests. 5xx always logs at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the health paths when health is enabled */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default no limit */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig
  errorHandling: ErrorHandling

  createApp?: () => Application
  routes: (app: Application) => void
  middleware?: { pre?: Middleware[]; post?: Middleware[] }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: DisabledConfig | Required<EnabledRequestIdConfig>
  requestLogging: DisabledConfig | Required<EnabledRequestLoggingConfig>
  health: ResolvedHealthConfig
  errorHandling: ErrorHandling
  createApp: () => Application
  routes: (app: Application) => void
  middleware: { pre: Middleware[]; post: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

/** Largest delay `setTimeout` accepts. */
const MAX_TIMER_MS: Milliseconds = 2_147_483_647

export const DEFAULTS = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestIdHeader: "x-request-id",
  requestLogLevel: "info",
  livenessPath: "/health",
  readinessPath: "/ready",
  checkTimeoutMs: 5_000,
} as const satisfies Record<string, string | number>

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealth(options.health)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestId(options.requestId),
    requestLogging: resolveRequestLogging(options.requestLogging, health),
    health,
    errorHandling: options.errorHandling,
    createApp: options.createApp ?? createApp,
    routes: options.routes,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealth(config: HealthConfig | undefined): ResolvedHealthConfig {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    livenessPath: config?.livenessPath ?? DEFAULTS.livenessPath,
    readinessPath: config?.readinessPath ?? DEFAULTS.readinessPath,
    readinessChecks: config?.readinessChecks ?? [],
    checkTimeoutMs: config?.checkTimeoutMs ?? DEFAULTS.checkTimeoutMs,
  }
}

function resolveRequestId(
  config: RequestIdConfig | undefined,
): ResolvedServerOptions["requestId"] {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    header: config?.header ?? DEFAULTS.requestIdHeader,
    generate: config?.generate ?? (() => randomUUID()),
  }
}

function resolveRequestLogging(
  config: RequestLoggingConfig | undefined,
  health: ResolvedHealthConfig,
): ResolvedServerOptions["requestLogging"] {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: config?.level ?? DEFAULTS.requestLogLevel,
    ignorePaths:
      config?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
