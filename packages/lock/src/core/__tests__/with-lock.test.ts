import { mock } from "vitest-mock-extended"
import { MemoryLock } from "../../adapters/memory/memory-lock"
import type { Lock } from "../../ports/lock"
import { LockError } from "../lock-error"
import { withLock } from "../with-lock"

describe("withLock", () => {
  it("returns the result and releases", async () => {
    const lock = new MemoryLock()

    await expect(withLock(lock, "k", async () => 42)).resolves.toBe(42)
    expect(lock.isHeld("k")).toBe(false)
  })

  it("releases when fn throws", async () => {
    const lock = new MemoryLock()

    await expect(
      withLock(lock, "k", async () => {
        throw new Error("commit failed")
      }),
    ).rejects.toThrow("commit failed")

    expect(lock.isHeld("k")).toBe(false)
  })

  it("runs critical sections one at a time", async () => {
    const lock = new MemoryLock()
    const events: string[] = []

    const section = (name: string) =>
      withLock(lock, "k", async () => {
        events.push(`${name}:start`)
        await Promise.resolve()
        await Promise.resolve()
        events.push(`${name}:end`)
      })

    await Promise.all([section("a"), section("b")])

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"])
  })

  it("throws a timeout error when the lease is not granted", async () => {
    const lock = mock<Lock>()
    lock.acquire.mockResolvedValue(null)

    await expect(withLock(lock, "k", async () => 1)).rejects.toMatchObject({
      code: "lock_timeout",
    })
  })

  it("throws an aborted error without acquiring when the signal is aborted", async () => {
    const lock = mock<Lock>()
    const controller = new AbortController()
    controller.abort()

    const attempt = withLock(lock, "k", async () => 1, { signal: controller.signal })

    await expect(attempt).rejects.toBeInstanceOf(LockError)
    await expect(attempt).rejects.toMatchObject({ code: "lock_aborted" })
    expect(lock.acquire).not.toHaveBeenCalled()
  })
})
