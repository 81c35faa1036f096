import type { Milliseconds } from "@configurator/clock"
import type { AcquireOptions, Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type MemoryLockConfig = {
  /** Used when `acquire` gets no `timeoutMs`. */
  defaultTimeoutMs: Milliseconds
}

type Waiter = {
  grant: (lease: LockLease) => void
}

type Slot = {
  holder: LockLease
  queue: Waiter[]
}

/**
 * In-process mutex keyed by string. Waiters are served in arrival order and
 * ownership passes directly from one holder to the next.
 */
export class MemoryLock implements Lock {
  private readonly slots = new Map<LockKey, Slot>()

  constructor(private readonly config: MemoryLockConfig = { defaultTimeoutMs: 30_000 }) {}

  async tryAcquire(key: LockKey): Promise<LockLease | null> {
    return this.slots.has(key) ? null : this.take(key)
  }

  async acquire(key: LockKey, opts: AcquireOptions = {}): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const slot = this.slots.get(key)
    if (!slot) return this.take(key)

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs

    return new Promise<LockLease | null>((resolve) => {
      const waiter: Waiter = {
        grant: (lease) => {
          cleanup()
          resolve(lease)
        },
      }

      const giveUp = () => {
        cleanup()
        const index = slot.queue.indexOf(waiter)
        if (index >= 0) slot.queue.splice(index, 1)
        resolve(null)
      }

      const timer = setTimeout(giveUp, timeoutMs)

      const cleanup = () => {
        clearTimeout(timer)
        opts.signal?.removeEventListener("abort", giveUp)
      }

      opts.signal?.addEventListener("abort", giveUp, { once: true })
      slot.queue.push(waiter)
    })
  }

  isHeld(key: LockKey): boolean {
    return this.slots.has(key)
  }

  private take(key: LockKey): LockLease {
    const lease = this.createLease(key)
    this.slots.set(key, { holder: lease, queue: [] })

    return lease
  }

  private createLease(key: LockKey): LockLease {
    let released = false

    const lease: LockLease = {
      key,
      release: async () => {
        if (released) return
        released = true
        this.handOff(key, lease)
      },
    }

    return lease
  }

  private handOff(key: LockKey, previous: LockLease): void {
    const slot = this.slots.get(key)
    if (slot?.holder !== previous) return

    const next = slot.queue.shift()

    if (!next) {
      this.slots.delete(key)
      return
    }

    slot.holder = this.createLease(key)
    next.grant(slot.holder)
  }
}
