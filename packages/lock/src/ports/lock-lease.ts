import type { LockKey } from "./lock"

export interface LockLease {
  readonly key: LockKey

  /** Idempotent. */
  release(): Promise<void>
}
