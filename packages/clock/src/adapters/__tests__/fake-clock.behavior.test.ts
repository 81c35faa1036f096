import { FakeClock } from "../fake-clock"

describe("FakeClock", () => {
  it("starts at the given instant", () => {
    const clock = new FakeClock(1_700_000_000_000)

    expect(clock.nowMs()).toBe(1_700_000_000_000)
    expect(clock.now().toISOString()).toBe("2023-11-14T22:13:20.000Z")
  })

  it("advance() and set() move time", () => {
    const clock = new FakeClock()

    clock.advance(250)
    expect(clock.nowMs()).toBe(250)

    clock.set(10)
    expect(clock.nowMs()).toBe(10)
  })

  it("sleep() advances time and records the duration", async () => {
    const clock = new FakeClock()

    await clock.sleep(3_600_000)
    await clock.sleep(5)

    expect(clock.nowMs()).toBe(3_600_005)
    expect(clock.sleeps).toEqual([3_600_000, 5])
  })

  it("sleep() is a no-op once the signal is aborted", async () => {
    const clock = new FakeClock()
    const controller = new AbortController()
    controller.abort()

    await clock.sleep(1000, controller.signal)

    expect(clock.nowMs()).toBe(0)
    expect(clock.sleeps).toEqual([])
  })
})
