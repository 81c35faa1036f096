import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /** Prefer `nowMs()` for arithmetic. */
  now(): Date

  nowMs(): UnixMs
}

export interface Sleeper {
  /** Waits `ms`, or less if `signal` aborts first. Never rejects. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
