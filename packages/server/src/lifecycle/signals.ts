import type { Logger } from "@configurator/logger"
import type { PhaseResult } from "./lifecycle-hook"

export interface SignalHandlerContext {
  logger: Logger
  stop: () => Promise<PhaseResult>
  /** Exit code after a fatal error. */
  exit?: (code: number) => void
  /** @default 10_000 */
  fatalTimeoutMs?: number
}

export interface SignalHandler {
  unregister: () => void
}

/**
 * SIGINT and SIGTERM trigger one graceful stop. An uncaught exception or
 * unhandled rejection triggers a stop bounded by `fatalTimeoutMs`, then exit(1).
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const exit = ctx.exit ?? ((code: number) => process.exit(code))
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })
    if (stopping) return
    stopping = true

    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    ctx.logger.fatal("Fatal error", { reason, err })

    if (stopping) {
      exit(1)
      return
    }
    stopping = true

    const timer = setTimeout(() => {
      ctx.logger.fatal("Forced exit after timeout", { timeoutMs: fatalTimeoutMs })
      exit(1)
    }, fatalTimeoutMs)
    timer.unref()

    void runStop(ctx, reason).finally(() => {
      clearTimeout(timer)
      exit(1)
    })
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const rejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  process.on("SIGINT", sigint)
  process.on("SIGTERM", sigterm)
  process.on("uncaughtException", uncaught)
  process.on("unhandledRejection", rejection)

  return {
    unregister: () => {
      process.off("SIGINT", sigint)
      process.off("SIGTERM", sigterm)
      process.off("uncaughtException", uncaught)
      process.off("unhandledRejection", rejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
