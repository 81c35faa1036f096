import type { Middleware } from "../server/server"

const SUPPRESSED = ["X-Powered-By", "Server"] as const

/** Drops response headers that name the server implementation. */
export function headerSuppressionMiddleware(): Middleware {
  return async (c, next) => {
    await next()

    for (const h of SUPPRESSED) c.res.headers.delete(h)
  }
}
