import fs from "node:fs/promises"
import path from "node:path"
import { DotenvSource, EnvSource, loadConfig, ObjectSource } from "@configurator/config"
import { toDialectUrl } from "@configurator/dburl"
import { type Logger, NullLogger } from "@configurator/logger"
import {
  type ConfigurationBag,
  ENV_PREFIX,
  type EnvConfig,
  type EnvKey,
  envSchema,
  type Subcommand,
} from "./schema"

/** Values from command line flags, keyed like the environment without the prefix. */
export type CliOverrides = Partial<Record<EnvKey, string | boolean>>

export type ResolveConfigurationOptions = {
  env?: Record<string, string | undefined>
  cliOverrides?: CliOverrides

  /** Positional subcommand; wins over `SUBCOMMAND` from the environment. */
  subcommand?: Subcommand | null

  /** Base for relative paths and the `.env` file. @default process.cwd() */
  cwd?: string

  /** @default ".env" */
  dotenvFile?: string
}

export type ResolveConfigurationDeps = {
  logger: Logger
}

/**
 * Builds the configuration bag. Later sources win: declared defaults, then
 * the `.env` file, then the process environment, then command line flags.
 *
 * @throws ConfigError when a value fails validation, e.g. a non-numeric port.
 */
export async function resolveConfiguration(
  options: ResolveConfigurationOptions = {},
  deps: ResolveConfigurationDeps = { logger: new NullLogger() },
): Promise<ConfigurationBag> {
  const cwd = options.cwd ?? process.cwd()

  const overrides: Record<string, unknown> = {
    ...options.cliOverrides,
    ...(options.subcommand && { SUBCOMMAND: options.subcommand }),
  }

  const result = await loadConfig({
    schema: envSchema,
    sources: [
      new DotenvSource({
        file: options.dotenvFile ?? ".env",
        required: false,
        prefix: ENV_PREFIX,
        cwd,
      }),
      new EnvSource({ prefix: ENV_PREFIX, ...(options.env && { env: options.env }) }),
      new ObjectSource(overrides, "cli"),
    ],
  })

  const config = mapEnvToConfig(result.value, cwd)

  return {
    ...config,
    databaseUrlSpecific: await resolveDialectUrl(config, deps.logger),
  }
}

export function mapEnvToConfig(env: EnvConfig, cwd: string): ConfigurationBag {
  const absolute = (p: string) => path.resolve(cwd, p)

  return {
    subcommand: env.SUBCOMMAND,
    debug: env.DEBUG,
    dockerLaunched: env.DOCKER_LAUNCHED,

    configPath: absolute(env.CONFIG_PATH),
    resourcePath: absolute(env.RESOURCE_PATH),
    supportPath: env.SUPPORT_PATH === null ? null : absolute(env.SUPPORT_PATH),

    engineConfigurationJson: env.ENGINE_CONFIGURATION_JSON,
    engineModule: env.ENGINE_MODULE,

    databaseUrl: env.DATABASE_URL,
    databaseUrlSpecific: null,
    internalDatabase: env.INTERNAL_DATABASE === null ? null : absolute(env.INTERNAL_DATABASE),
    internalDatabaseSeed: absolute(env.INTERNAL_DATABASE_SEED),
    configStore: env.CONFIG_STORE,

    host: env.HOST,
    port: env.PORT,
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    sleepTimeInSeconds: env.SLEEP_TIME_IN_SECONDS,

    logLevel: env.LOG_LEVEL,
    logPretty: env.LOG_PRETTY,
  }
}

/**
 * An internal database is seeded from the bundled file and addressed
 * directly. Otherwise the canonical URL is transcoded; a URL that cannot be
 * transcoded is logged and yields `null`.
 */
async function resolveDialectUrl(
  config: ConfigurationBag,
  logger: Logger,
): Promise<string | null> {
  if (config.internalDatabase !== null) {
    await seedInternalDatabase(config.internalDatabaseSeed, config.internalDatabase)

    return `sqlite3://na:na@${config.internalDatabase}`
  }

  try {
    return toDialectUrl(config.databaseUrl, logger)
  } catch (err) {
    logger.error("Could not derive the dialect database URL", { err })
    return null
  }
}

async function seedInternalDatabase(seed: string, target: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true })
  await fs.copyFile(seed, target)
}
