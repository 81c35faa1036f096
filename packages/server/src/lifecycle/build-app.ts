import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Application
  options: ResolvedServerOptions
  isReady: () => boolean
  defaultMiddleware: Middleware[]
  errorHandler: ErrorHandler
}

export function buildApp(ctx: BuildAppContext): Application {
  const { app, options } = ctx

  if (options.health.enabled) {
    registerHealthRoutes(app, options.health, ctx.isReady)
  }

  use(app, ctx.defaultMiddleware)
  use(app, options.middleware.pre)
  options.routes(app)
  use(app, options.middleware.post)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp

function use(app: Application, middleware: Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
