import { isSubcommand, type Subcommand } from "../config"
import type { CommandContext, CommandHandler } from "./command"
import { runDockerAcceptanceTest } from "./docker-acceptance-test"
import { withEntryExit } from "./entry-exit"
import { runService } from "./service"
import { runSleep } from "./sleep"
import { runVersion } from "./version"

export type CommandTable = Record<Subcommand, CommandHandler>

export const commandHandlers: CommandTable = {
  service: withEntryExit(runService),
  sleep: withEntryExit(runSleep),
  version: runVersion,
  "docker-acceptance-test": withEntryExit(runDockerAcceptanceTest),
}

export type DispatchOptions = {
  printHelp: () => void
  handlers?: CommandTable
}

/**
 * Runs the configured subcommand. Without one, prints help, then sleeps if
 * the process was launched by a container runtime.
 */
export async function dispatch(ctx: CommandContext, options: DispatchOptions): Promise<void> {
  const handlers = options.handlers ?? commandHandlers
  const { subcommand } = ctx.config

  if (subcommand === null) {
    options.printHelp()

    if (ctx.config.dockerLaunched) await handlers.sleep(ctx)
    return
  }

  if (!isSubcommand(subcommand)) {
    ctx.core.logger.warn("Unknown subcommand", { subcommand })
    options.printHelp()
    return
  }

  await handlers[subcommand](ctx)
}
