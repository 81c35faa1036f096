import { FakeClock } from "@configurator/clock"
import { MemoryLock } from "@configurator/lock"
import type { Logger } from "@configurator/logger"
import { mock } from "vitest-mock-extended"
import { makeConfig } from "../../../tests/fixtures"
import { runSleep } from "../sleep"

describe("runSleep", () => {
  it("sleeps once for a positive duration", async () => {
    const clock = new FakeClock()
    const logger = mock<Logger>()

    await runSleep({
      config: makeConfig({ sleepTimeInSeconds: 5 }),
      core: { clock, logger, lock: new MemoryLock() },
      signal: new AbortController().signal,
    })

    expect(clock.sleeps).toEqual([5000])
    expect(logger.info).toHaveBeenCalledWith("Sleeping", { seconds: 5 })
  })

  it("sleeps in hourly steps until aborted when the duration is 0", async () => {
    const clock = new FakeClock()
    const logger = mock<Logger>()
    const controller = new AbortController()
    let ticks = 0

    logger.info.mockImplementation(() => {
      ticks++
      if (ticks === 3) controller.abort()
    })

    await runSleep({
      config: makeConfig({ sleepTimeInSeconds: 0 }),
      core: { clock, logger, lock: new MemoryLock() },
      signal: controller.signal,
    })

    expect(clock.sleeps).toEqual([3_600_000, 3_600_000])
    expect(logger.info).toHaveBeenCalledTimes(3)
    expect(logger.info).toHaveBeenLastCalledWith("Sleeping indefinitely", { tickSeconds: 3600 })
  })
})
