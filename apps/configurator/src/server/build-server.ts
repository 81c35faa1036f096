import {
  type Application,
  createServer,
  type LifecycleHook,
  type Server,
} from "@configurator/server"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.host,
      port: ctx.config.port,
      shutdownTimeoutMs: ctx.config.shutdownTimeoutMs,

      errorHandling: {
        kind: "mappings",
        config: {
          mappings: {
            validation_error: { status: 422, message: "Invalid request" },
            config_store_unavailable: {
              status: 503,
              message: "Configuration store unavailable",
            },
            lock_timeout: { status: 503, message: "Configuration is busy, try again" },
          },
          transformContext: (error) =>
            error.code === "validation_error" ? { issues: error.context.issues } : undefined,
        },
      },

      health: {
        enabled: true,
        readinessChecks: [
          {
            name: "config:default",
            fn: async () => (await ctx.infra.configStore.getDefaultConfigId()) !== null,
          },
        ],
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.services.domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
