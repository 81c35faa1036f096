import { type Clock, SystemClock } from "@configurator/clock"
import { type Lock, MemoryLock } from "@configurator/lock"
import { createPinoLogger, type Logger } from "@configurator/logger"
import type { ConfigurationBag } from "../config"

export const SERVICE_NAME = "configurator"

/** Secret fields of a bag logged under `config`. Left visible when debugging. */
export const REDACTED_CONFIG_PATHS = [
  "config.engineConfigurationJson",
  "config.databaseUrl",
  "config.databaseUrlSpecific",
] as const

export type CoreServices = {
  logger: Logger
  clock: Clock
  lock: Lock
}

export function createCoreServices(
  config: Pick<ConfigurationBag, "logLevel" | "logPretty" | "debug">,
): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logLevel,
      prettify: config.logPretty,
      redact: config.debug ? [] : [...REDACTED_CONFIG_PATHS],
    },
    { service: SERVICE_NAME },
  )

  const lock = new MemoryLock()

  return { clock, logger, lock }
}
