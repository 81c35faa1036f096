import { UPDATED, VERSION } from "../version"
import type { CommandContext } from "./command"

export async function runVersion({ config, core }: CommandContext): Promise<void> {
  core.logger.info(`configurator version ${VERSION} updated ${UPDATED}`, {
    version: VERSION,
    updated: UPDATED,
  })
  core.logger.debug("Version requested", { subcommand: config.subcommand ?? "version" })
}
