import type { Clock, UnixMs } from "@configurator/clock"
import type { Logger } from "@configurator/logger"
import type { HookFailure, HookPhase, LifecycleHook } from "./lifecycle-hook"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failure (startup). */
  failFast?: boolean
}

type HookOutcome = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks in order against a shared deadline. Each hook gets an
 * AbortSignal that fires when the deadline passes; once it has passed the
 * remaining hooks are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<{ failures: HookFailure[]; timedOut: boolean }> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const outcome = await runOne(ctx, hook)

    if (outcome.failure) {
      failures.push(outcome.failure)
      if (policy.failFast) return { failures, timedOut: outcome.timedOut }
    }

    if (outcome.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOne(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookOutcome> {
  const remaining = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())

  if (remaining <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks, deadline passed`, {
      hook: hook.name,
    })
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), remaining)
  const expired = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: remaining })

    if (expired()) {
      ctx.logger.warn(`${ctx.phase} hook overran the deadline`, { hook: hook.name })
      return { timedOut: true }
    }

    ctx.logger.debug(`${ctx.phase} hook done`, { hook: hook.name })
    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${ctx.phase} hook failed`, { hook: hook.name, err })

    return { failure: { hook: hook.name, error: err }, timedOut: expired() }
  } finally {
    clearTimeout(timer)
  }
}
