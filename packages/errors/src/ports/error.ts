export type ErrorCode = Lowercase<string>

/** Structured metadata carried by an error (ids, keys, offending input). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if the same call may succeed when repeated. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, store offline),
   * `false` for broken invariants such as a corrupted snapshot document.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by log serializers and HTTP error bodies.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
