import { type AppError, type ErrorCode, isAppError } from "@configurator/errors"
import type { Logger } from "@configurator/logger"
import type { ErrorStatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: ErrorStatusCode

  /** Client-facing message. Never include secrets. */
  message: string
}

export type FallbackMapping = ErrorMapping & { code: ErrorCode }

export interface ErrorMappingsConfig {
  /** Unmapped AppErrors keep their code but take the fallback status and message. */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>
  fallback?: FallbackMapping

  /** Extra response fields from the error; `undefined` adds none. */
  transformContext?: (error: AppError) => Record<string, unknown> | undefined
}

export type ErrorResponseBody = {
  status: ErrorStatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = { error: ErrorResponseBody }

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(
  config: ErrorMappingsConfig,
  logger: Logger,
): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]

    return {
      error: {
        ...extraFields(config, error, logger),
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping?.message ?? fallback.message,
        requestId,
      },
    }
  }
}

function extraFields(
  config: ErrorMappingsConfig,
  error: AppError,
  logger: Logger,
): Record<string, unknown> {
  if (!config.transformContext) return {}

  try {
    return config.transformContext(error) ?? {}
  } catch (err) {
    logger.warn("Error context transform failed", { err, code: error.code })
    return {}
  }
}
