import type { Milliseconds, Seconds } from "@configurator/clock"
import { type LogLevelName, logLevelNames } from "@configurator/logger"
import { z } from "zod"

/** Environment variables are read as `CONFIGURATOR_<KEY>`. */
export const ENV_PREFIX = "CONFIGURATOR_"

export const SUBCOMMANDS = ["service", "sleep", "version", "docker-acceptance-test"] as const

export type Subcommand = (typeof SUBCOMMANDS)[number]

export function isSubcommand(value: unknown): value is Subcommand {
  return SUBCOMMANDS.some((name) => name === value)
}

export const CONFIG_STORE_KINDS = ["memory", "postgres"] as const

export type ConfigStoreKind = (typeof CONFIG_STORE_KINDS)[number]

const TRUE_TOKENS = new Set(["true", "1", "t", "y", "yes"])

/** `true`, `1`, `t`, `y` and `yes` in any case are true; every other string is false. */
export function parseFlag(value: string | boolean): boolean {
  if (typeof value === "boolean") return value

  return TRUE_TOKENS.has(value.trim().toLowerCase())
}

const LOG_LEVEL_ALIASES: Readonly<Record<string, LogLevelName>> = {
  warning: "warn",
  critical: "fatal",
}

const flag = () => z.union([z.boolean(), z.string()]).default(false).transform(parseFlag)

/** A blank value counts as unset, so the declared default applies. */
const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value

/** Decimal digits only; signs, exponents and hex prefixes are rejected. */
const integer = (fallback: number) =>
  z.preprocess(
    blankAsUnset,
    z
      .union([
        z.number().int().nonnegative(),
        z
          .string()
          .regex(/^\s*\d+\s*$/, { error: "Expected a non-negative whole number" })
          .transform((value) => Number(value.trim())),
      ])
      .default(fallback),
  )

const text = (fallback: string) => z.preprocess(blankAsUnset, z.string().default(fallback))

const optionalText = () =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === "" ? null : value))

const logLevel = () =>
  z
    .string()
    .default("info")
    .transform((value) => {
      const name = value.trim().toLowerCase()
      return LOG_LEVEL_ALIASES[name] ?? name
    })
    .pipe(z.enum(logLevelNames))

export const envSchema = z.object({
  SUBCOMMAND: optionalText(),
  DEBUG: flag(),
  DOCKER_LAUNCHED: flag(),

  CONFIG_PATH: text("/etc/opt/configurator"),
  RESOURCE_PATH: text("/opt/configurator/resources"),
  SUPPORT_PATH: z
    .string()
    .default("/opt/configurator/data")
    .transform((value) => (value === "" ? null : value)),

  ENGINE_CONFIGURATION_JSON: optionalText(),
  ENGINE_MODULE: optionalText(),

  DATABASE_URL: text("sqlite3://na:na@/var/opt/configurator/sqlite/G2C.db"),
  INTERNAL_DATABASE: optionalText(),
  INTERNAL_DATABASE_SEED: text("/opt/configurator/resources/templates/G2C.db"),
  CONFIG_STORE: z.enum(CONFIG_STORE_KINDS).default("memory"),

  HOST: text("0.0.0.0"),
  PORT: integer(8253),
  SHUTDOWN_TIMEOUT_MS: integer(10_000),
  SLEEP_TIME_IN_SECONDS: integer(0),

  LOG_LEVEL: logLevel(),
  LOG_PRETTY: flag(),
})

export type EnvConfig = z.infer<typeof envSchema>

export type EnvKey = keyof typeof envSchema.shape

/**
 * The resolved configuration bag. Built once per process and never mutated.
 */
export type ConfigurationBag = Readonly<{
  /** Raw value; may name a subcommand that does not exist. */
  subcommand: string | null
  debug: boolean
  dockerLaunched: boolean

  configPath: string
  resourcePath: string
  supportPath: string | null

  engineConfigurationJson: string | null
  engineModule: string | null

  /** Canonical, engine-agnostic URL. */
  databaseUrl: string

  /** `databaseUrl` in the backing store's dialect; `null` when it could not be derived. */
  databaseUrlSpecific: string | null
  internalDatabase: string | null
  internalDatabaseSeed: string
  configStore: ConfigStoreKind

  host: string
  port: number
  shutdownTimeoutMs: Milliseconds
  sleepTimeInSeconds: Seconds

  logLevel: LogLevelName
  logPretty: boolean
}>
