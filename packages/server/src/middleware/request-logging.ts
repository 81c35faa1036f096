import type { Logger } from "@configurator/logger"
import { routePath } from "hono/route"
import type { Middleware } from "../server/server"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** One line per completed request; 5xx always at `error`. */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const method = c.req.method
      const route = isNonEmptyString(routePath(c)) ? routePath(c) : path
      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method,
        path,
        route,
        status,
        durationMs: Math.round(performance.now() - start),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) logger.error("Request completed", meta)
      else logger[config.level]("Request completed", meta)
    }
  }
}

function shouldIgnore(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((p) => path === p || path.startsWith(`${p}/`))
}
