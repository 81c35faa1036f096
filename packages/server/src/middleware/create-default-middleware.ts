import type { Logger } from "@configurator/logger"
import type { Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import { headerSuppressionMiddleware } from "./header-suppression"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  logger: Logger,
): Middleware[] {
  const middleware: Middleware[] = [headerSuppressionMiddleware()]

  if (options.requestId.enabled) middleware.push(requestIdMiddleware(options.requestId))

  middleware.push(requestLoggerMiddleware(logger))

  if (options.requestLogging.enabled) {
    middleware.push(requestLoggingMiddleware(options.requestLogging, logger))
  }

  return middleware
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
