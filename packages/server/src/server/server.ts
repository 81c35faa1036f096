import {
  type Handler,
  Hono,
  type Context as HonoContext,
  type MiddlewareHandler,
} from "hono"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { ServerError } from "../errors/server-error"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import {
  type CreateStopperFn,
  createStopper,
  type ServerHandle,
} from "../lifecycle/create-stopper"
import type { PhaseResult } from "../lifecycle/lifecycle-hook"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export function createApp(): Application {
  return new Hono()
}

export function createRouter(): Router {
  return new Hono()
}

export class Server {
  readonly app: Application

  private state: ServerState = "idle"
  private ready = false
  private running?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.app = options.createApp()
  }

  /**
   * Wires routes, middleware and error handling without running hooks or
   * binding a port. Tests drive the result through `app.request()`.
   */
  build(): Application {
    return this.collabs.buildApp({
      app: this.app,
      options: this.options,
      isReady: () => this.ready,
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps.logger),
      errorHandler: this.collabs.createErrorHandler(this.options, this.deps.logger),
    })
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.running?.stop() ?? this.noopStop(),
    })

    return this
  }

  /** Runs start hooks, then listens. Throws `startup_failed` if a hook fails. */
  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") throw ServerError.alreadyStarted()

    this.state = "starting"

    try {
      const result = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!result.ok) throw ServerError.startupFailed(result.failures, result.timedOut)

      const server = this.collabs.listen(this.build(), this.options, this.deps.logger)

      this.running = this.collabs.createStopper({
        server,
        deps: this.deps,
        options: this.options,
        stopHooks: this.options.stopHooks,
        setReady: (v) => {
          this.ready = v
        },
        shutdown: this.collabs.onShutdown,
        onStop: () => this.signalHandler?.unregister(),
      })

      this.ready = true
      this.state = "started"

      return this.running
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<PhaseResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
