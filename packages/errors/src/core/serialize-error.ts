import type { AppError, SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Converts any thrown value into a {@link SerializedError}, following the
 * `cause` chain. Plain errors get the code `"unknown"` and are flagged as
 * non-operational.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (isAppError(err)) return serializeAppError(err, options)

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      isRetryable: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(options.includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    isRetryable: false,
    timestamp: new Date().toISOString(),
  }
}

function serializeAppError(err: AppError, options: SerializeOptions): SerializedError {
  return {
    name: err.name,
    code: err.code,
    message: err.message,
    context: { ...err.context },
    isOperational: err.isOperational,
    isRetryable: err.isRetryable,
    timestamp: err.timestamp.toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack && { stack: err.stack }),
  }
}
