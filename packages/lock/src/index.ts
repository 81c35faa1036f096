export { MemoryLock, type MemoryLockConfig } from "./adapters/memory/memory-lock"
export { LockError, type LockErrorCode } from "./core/lock-error"
export { withLock } from "./core/with-lock"
export type { AcquireOptions, Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
