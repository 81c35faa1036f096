import { SystemClock } from "../system-clock"

describe("SystemClock", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("reads the system time", () => {
    const clock = new SystemClock()

    expect(clock.nowMs()).toBe(Date.parse("2026-01-01T00:00:00.000Z"))
    expect(clock.now()).toEqual(new Date("2026-01-01T00:00:00.000Z"))
  })

  it("sleep() resolves after the delay", async () => {
    const clock = new SystemClock()
    let done = false

    const pending = clock.sleep(1000).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(999)
    expect(done).toBe(false)

    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toBe(true)
  })

  it("sleep() resolves early on abort", async () => {
    const clock = new SystemClock()
    const controller = new AbortController()

    const pending = clock.sleep(60_000, controller.signal)
    controller.abort()

    await expect(pending).resolves.toBeUndefined()
  })

  it("sleep() resolves immediately for non-positive delays", async () => {
    await expect(new SystemClock().sleep(0)).resolves.toBeUndefined()
  })
})
