import type { LifecycleHook } from "@configurator/server"
import type { AppContext } from "../create-context"
import { ENGINE_NAME } from "../services/engine"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const hooks: LifecycleHook[] = []
  const postgres = context.infra.postgres

  if (postgres) {
    hooks.push({
      name: "start:postgres:schema",
      fn: async () => {
        await postgres.store.ensureSchema()
      },
    })
  }

  hooks.push(
    {
      name: "start:config:default",
      fn: async () => {
        await context.services.domains.datasources.initializer.initialize()
      },
    },
    {
      name: "start:engine",
      fn: async () => {
        await context.engine.engine.init(
          ENGINE_NAME,
          context.engine.settings,
          context.config.debug,
        )
      },
    },
  )

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
