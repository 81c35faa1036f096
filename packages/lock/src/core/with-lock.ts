import type { AcquireOptions, Lock, LockKey } from "../ports/lock"
import { LockError } from "./lock-error"

/**
 * Runs `fn` while holding `key`, releasing on every exit path.
 *
 * @throws LockError when the lease cannot be obtained.
 */
export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: AcquireOptions = {},
): Promise<T> {
  if (opts.signal?.aborted) throw LockError.aborted(key)

  const lease = await lock.acquire(key, opts)

  if (!lease) {
    throw opts.signal?.aborted ? LockError.aborted(key) : LockError.timeout(key)
  }

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
