import type { Logger } from "@configurator/logger"
import type { Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Binds a child logger carrying the request id to the context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    const requestId = c.get("requestId")

    c.set("logger", baseLogger.child(isNonEmptyString(requestId) ? { requestId } : {}))

    await next()
  }
}
