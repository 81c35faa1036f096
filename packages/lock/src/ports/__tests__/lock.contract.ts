import type { Lock } from "../lock"

export type LockHarness = {
  name: string
  make: () => Lock
}

export function describeLockContract(h: LockHarness) {
  describe(`${h.name} (Lock contract)`, () => {
    it("tryAcquire() grants a free key once", async () => {
      const lock = h.make()

      const first = await lock.tryAcquire("config:default")
      const second = await lock.tryAcquire("config:default")

      expect(first?.key).toBe("config:default")
      expect(second).toBeNull()
    })

    it("keys are independent", async () => {
      const lock = h.make()

      await lock.tryAcquire("a")

      expect(await lock.tryAcquire("b")).not.toBeNull()
    })

    it("release() frees the key and is idempotent", async () => {
      const lock = h.make()

      const lease = await lock.tryAcquire("k")
      await lease?.release()
      await lease?.release()

      expect(await lock.tryAcquire("k")).not.toBeNull()
    })

    it("acquire() waits for the holder to release", async () => {
      const lock = h.make()
      const held = await lock.tryAcquire("k")

      const waiting = lock.acquire("k", { timeoutMs: 1_000 })
      await held?.release()

      const next = await waiting
      expect(next?.key).toBe("k")
    })

    it("acquire() returns null when already aborted", async () => {
      const lock = h.make()
      const controller = new AbortController()
      controller.abort()

      expect(await lock.acquire("k", { signal: controller.signal })).toBeNull()
    })
  })
}
