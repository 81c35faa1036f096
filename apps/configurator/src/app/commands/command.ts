import type { ConfigurationBag } from "../config"
import type { CoreServices } from "../services/core"

export type CommandContext = {
  config: ConfigurationBag
  core: CoreServices

  /** Aborted on SIGINT or SIGTERM. */
  signal: AbortSignal
}

export type CommandHandler = (ctx: CommandContext) => Promise<void>
