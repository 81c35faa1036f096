import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural guard: accepts any error carrying the {@link AppError} fields,
 * including ones built by another copy of this package.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  const timestamp = e["timestamp"]

  return (
    typeof e["code"] === "string" &&
    isRecord(e["context"]) &&
    typeof e["isRetryable"] === "boolean" &&
    typeof e["isOperational"] === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf())
  )
}
