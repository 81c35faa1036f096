import { BaseError } from "@configurator/errors"
import type { LockKey } from "../ports/lock"

export type LockErrorCode = "lock_timeout" | "lock_aborted"

export class LockError extends BaseError<LockErrorCode> {
  static timeout(key: LockKey): LockError {
    return new LockError(`Timed out waiting for lock "${key}"`, {
      code: "lock_timeout",
      context: { key },
      isRetryable: true,
    })
  }

  static aborted(key: LockKey): LockError {
    return new LockError(`Gave up waiting for lock "${key}"`, {
      code: "lock_aborted",
      context: { key },
    })
  }
}
