import type { LifecycleHook } from "@configurator/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const hooks: LifecycleHook[] = [
    {
      name: "stop:engine",
      fn: async () => {
        await context.engine.engine.destroy()
      },
    },
  ]
  const postgres = context.infra.postgres

  if (postgres) {
    hooks.push({
      name: "stop:postgres",
      fn: async () => {
        await postgres.pool.end()
      },
    })
  }

  return hooks
}

export type CreateStopHooksFn = typeof createStopHooks
