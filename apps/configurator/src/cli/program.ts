import { Command, Option, type OutputConfiguration } from "commander"
import { type CliOverrides, SUBCOMMANDS, type Subcommand } from "../app/config"
import type { EnvKey } from "../app/config/schema"
import { VERSION } from "../app/version"

type FlagSpec = {
  flags: string
  description: string
  key: EnvKey
}

const COMMON_FLAGS: FlagSpec[] = [
  { flags: "--debug", description: "Enable debugging", key: "DEBUG" },
  {
    flags: "--log-level <level>",
    description: "trace, debug, info, warn, error or fatal",
    key: "LOG_LEVEL",
  },
]

const SERVICE_FLAGS: FlagSpec[] = [
  {
    flags: "--config-path <path>",
    description: "Engine configuration directory",
    key: "CONFIG_PATH",
  },
  {
    flags: "--resource-path <path>",
    description: "Engine resource directory",
    key: "RESOURCE_PATH",
  },
  {
    flags: "--support-path <path>",
    description: "Engine support directory",
    key: "SUPPORT_PATH",
  },
  { flags: "--database-url <url>", description: "Canonical database URL", key: "DATABASE_URL" },
  {
    flags: "--internal-database <path>",
    description: "Seed and use an embedded database at this path",
    key: "INTERNAL_DATABASE",
  },
  {
    flags: "--engine-configuration-json <json>",
    description: "Engine settings document; replaces the one built from paths",
    key: "ENGINE_CONFIGURATION_JSON",
  },
  {
    flags: "--engine-module <specifier>",
    description: "Module exporting an engine binding",
    key: "ENGINE_MODULE",
  },
  { flags: "--config-store <kind>", description: "memory or postgres", key: "CONFIG_STORE" },
  { flags: "--host <host>", description: "Host to listen on", key: "HOST" },
  { flags: "--port <port>", description: "Port to listen on", key: "PORT" },
]

const SLEEP_FLAGS: FlagSpec[] = [
  {
    flags: "--sleep-time-in-seconds <seconds>",
    description: "Seconds to sleep; 0 sleeps until interrupted",
    key: "SLEEP_TIME_IN_SECONDS",
  },
]

const COMMANDS: Record<Subcommand, { description: string; flags: FlagSpec[] }> = {
  service: { description: "Receive HTTP requests", flags: SERVICE_FLAGS },
  sleep: { description: "Do nothing but sleep", flags: SLEEP_FLAGS },
  version: { description: "Log the version", flags: [] },
  "docker-acceptance-test": { description: "Log entry and exit, then stop", flags: SERVICE_FLAGS },
}

export type Invocation = {
  subcommand: Subcommand
  overrides: CliOverrides
}

/**
 * Builds the command line; `onInvoke` receives the chosen subcommand and its
 * flags. Commander throws instead of exiting, from subcommands too.
 */
export function createProgram(
  onInvoke: (invocation: Invocation) => void,
  output?: OutputConfiguration,
): Command {
  const program = new Command()
    .name("configurator")
    .description(
      "Manage data sources of a record-matching engine. Every flag can also be set as CONFIGURATOR_<FLAG>.",
    )
    .version(VERSION)
    .exitOverride()

  // Subcommands copy these settings when created.
  if (output) program.configureOutput(output)

  for (const subcommand of SUBCOMMANDS) {
    const definition = COMMANDS[subcommand]
    const bound = [...definition.flags, ...COMMON_FLAGS].map((flag) => ({
      key: flag.key,
      option: new Option(flag.flags, flag.description),
    }))

    const command = program.command(subcommand).description(definition.description)

    for (const { option } of bound) command.addOption(option)

    command.action((_options: unknown, cmd: Command) => {
      const values: Record<string, unknown> = cmd.opts()
      const overrides: CliOverrides = {}

      for (const { key, option } of bound) {
        const value = values[option.attributeName()]
        if (typeof value === "string" || typeof value === "boolean") overrides[key] = value
      }

      onInvoke({ subcommand, overrides })
    })
  }

  return program
}

export type CommandLine = {
  subcommand: Subcommand | null
  overrides: CliOverrides
}

/**
 * Parses `args` (without the node and script entries). An empty list parses
 * to no subcommand rather than commander's help exit.
 *
 * @throws CommanderError for bad input and after `--help` or `--version`.
 */
export async function parseCommandLine(
  args: readonly string[],
  output?: OutputConfiguration,
): Promise<CommandLine> {
  if (args.length === 0) return { subcommand: null, overrides: {} }

  const captured: { invocation?: Invocation } = {}
  const program = createProgram((invocation) => {
    captured.invocation = invocation
  }, output)

  await program.parseAsync([...args], { from: "user" })

  return captured.invocation ?? { subcommand: null, overrides: {} }
}

export function helpText(): string {
  return createProgram(() => undefined).helpInformation()
}
