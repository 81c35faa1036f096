import type { Clock, UnixMs } from "@configurator/clock"
import type { Logger } from "@configurator/logger"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: LifecycleHook[]
}

/**
 * Closes the listener first, then runs every stop hook even if some fail.
 * `timedOut` means work was skipped, not that sockets were killed.
 */
export async function shutdown(ctx: ShutdownContext): Promise<PhaseResult> {
  ctx.logger.info("Shutting down")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failures: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) => closeUntilAborted(server, signal),
  }
}

function closeUntilAborted(server: Closeable, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise((resolve, reject) => {
    const onAbort = () => resolve()

    signal.addEventListener("abort", onAbort, { once: true })

    server.close((err) => {
      signal.removeEventListener("abort", onAbort)
      if (err) reject(err)
      else resolve()
    })
  })
}
