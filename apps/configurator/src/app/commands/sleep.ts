import { secondsToMs } from "@configurator/clock"
import type { CommandContext } from "./command"

const FOREVER_TICK_SECONDS = 3600

/**
 * Sleeps `sleepTimeInSeconds`, or until aborted when it is 0, logging once
 * per hour.
 */
export async function runSleep({ config, core, signal }: CommandContext): Promise<void> {
  const seconds = config.sleepTimeInSeconds

  if (seconds > 0) {
    core.logger.info("Sleeping", { seconds })
    await core.clock.sleep(secondsToMs(seconds), signal)
    return
  }

  while (!signal.aborted) {
    core.logger.info("Sleeping indefinitely", { tickSeconds: FOREVER_TICK_SECONDS })
    await core.clock.sleep(secondsToMs(FOREVER_TICK_SECONDS), signal)
  }
}
