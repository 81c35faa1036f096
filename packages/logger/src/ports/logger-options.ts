import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human readable output for local runs. Keep off in containers. */
  prettify?: boolean

  /**
   * Dot paths whose values are replaced with `"[REDACTED]"` before an entry
   * is written, e.g. `"config.databaseUrl"`.
   */
  redact?: string[]
}
