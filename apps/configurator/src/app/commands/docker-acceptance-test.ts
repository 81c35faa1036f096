import type { CommandContext } from "./command"

/** Starts and exits; the entry and exit lines are the whole test. */
export async function runDockerAcceptanceTest({ core }: CommandContext): Promise<void> {
  core.logger.debug("Docker acceptance test")
}
