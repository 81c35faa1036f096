import type { CommandHandler } from "./command"

/**
 * Wraps `handler` with entry and exit log lines carrying the configuration.
 * Secret fields are redacted by the logger unless debugging.
 */
export function withEntryExit(handler: CommandHandler): CommandHandler {
  return async (ctx) => {
    const { clock, logger } = ctx.core
    const startTime = clock.now()

    logger.info("Entry", { config: ctx.config, startTime: startTime.toISOString() })

    try {
      await handler(ctx)
    } finally {
      const stopTime = clock.now()

      logger.info("Exit", {
        config: ctx.config,
        startTime: startTime.toISOString(),
        stopTime: stopTime.toISOString(),
        elapsedTime: (stopTime.getTime() - startTime.getTime()) / 1000,
      })
    }
  }
}
