import type { Milliseconds } from "@configurator/clock"
import type { LockLease } from "./lock-lease"

export type LockKey = string

export type AcquireOptions = {
  /** Max time to wait. Falls back to the adapter's default. */
  timeoutMs?: Milliseconds

  /** Gives up waiting early. Has no effect once the lease is held. */
  signal?: AbortSignal
}

export interface Lock {
  /**
   * Waits for exclusive ownership of `key`.
   *
   * @returns the lease, or `null` when the wait timed out or was aborted.
   */
  acquire(key: LockKey, opts?: AcquireOptions): Promise<LockLease | null>

  /** Takes `key` only if nobody holds it. */
  tryAcquire(key: LockKey): Promise<LockLease | null>
}
