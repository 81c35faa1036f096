import type { Milliseconds } from "@configurator/clock"

export interface LifecycleHookContext {
  /** Aborted when the phase deadline passes. */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}

export type HookPhase = "startup" | "shutdown"

export type PhaseResult = {
  /** No failures and no timeout. */
  ok: boolean
  failures: HookFailure[]
  timedOut: boolean
}
