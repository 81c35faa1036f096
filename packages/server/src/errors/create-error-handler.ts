import type { Logger } from "@configurator/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { ResolvedServerOptions } from "../server/server-options"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(
  options: ResolvedServerOptions,
  logger: Logger,
): ErrorHandler {
  return options.errorHandling.kind === "handler"
    ? options.errorHandling.errorHandler
    : fromMappings(options.errorHandling.config, logger)
}

export type CreateErrorHandlerFn = typeof createErrorHandler

function fromMappings(config: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const format = createErrorFormatter(config, logger)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)
    const { status, code } = response.error
    const route = isNonEmptyString(routePath(c)) ? routePath(c) : c.req.path
    const meta = { requestId, method: c.req.method, route, status, code }

    // 5xx logs the error; 4xx keeps it at debug.
    if (status >= 500) {
      logger.error("Request failed", { ...meta, err })
    } else {
      logger.info("Request failed", meta)
      logger.debug("Request failed details", { ...meta, err })
    }

    return c.json(response, { status })
  }
}
