import { createPinoLogger, type Logger } from "@configurator/logger"
import { CommanderError } from "commander"
import { dispatch } from "./app/commands"
import { resolveConfiguration } from "./app/config"
import { createCoreServices } from "./app/services/core"
import { abortOnSignals, helpText, parseCommandLine } from "./cli"

export async function main(args: readonly string[]): Promise<number> {
  const bootstrapLogger = createPinoLogger({}, { level: "info" }, { component: "bootstrap" })
  let logger: Logger = bootstrapLogger

  try {
    const commandLine = await parseCommandLine(args)

    const config = await resolveConfiguration(
      { cliOverrides: commandLine.overrides, subcommand: commandLine.subcommand },
      { logger: bootstrapLogger },
    )

    const core = createCoreServices(config)
    logger = core.logger

    const scope = abortOnSignals()

    try {
      await dispatch(
        { config, core, signal: scope.signal },
        { printHelp: () => process.stdout.write(helpText()) },
      )
    } finally {
      scope.dispose()
    }

    return 0
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode

    logger.fatal("configurator failed", { err })
    return 1
  }
}

const code = await main(process.argv.slice(2))

if (code !== 0) process.exit(code)
