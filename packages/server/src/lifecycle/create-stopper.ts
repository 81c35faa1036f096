import type { Closeable, ShutdownFn } from "./shutdown"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"

export interface ServerHandle {
  /** Idempotent: concurrent and repeated calls share one shutdown. */
  stop(): Promise<PhaseResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  server: Closeable
  deps: ServerDependencies
  options: ResolvedServerOptions
  stopHooks: LifecycleHook[]
  setReady: (value: boolean) => void
  shutdown: ShutdownFn
  onStop: () => void
}

export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<PhaseResult> | undefined

  const run = async (): Promise<PhaseResult> => {
    ctx.setReady(false)

    try {
      return await ctx.shutdown({
        server: ctx.server,
        clock: ctx.deps.clock,
        logger: ctx.deps.logger,
        deadlineMs: ctx.deps.clock.nowMs() + ctx.options.shutdownTimeoutMs,
        stopHooks: ctx.stopHooks,
      })
    } finally {
      ctx.onStop()
    }
  }

  return {
    stop: () => {
      stopping ??= run()
      return stopping
    },
    address: { host: ctx.options.host, port: ctx.options.port },
  }
}

export type CreateStopperFn = typeof createStopper
