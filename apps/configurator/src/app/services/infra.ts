import { parseDatabaseUrl } from "@configurator/dburl"
import { type ConfigStore, MemoryConfigStore, PostgresConfigStore } from "@configurator/engine"
import type { Logger } from "@configurator/logger"
import type { Pool, PoolConfig } from "pg"
import type { ConfigurationBag } from "../config"
import type { CoreServices } from "./core"

export type PostgresClients = {
  pool: Pool
  store: PostgresConfigStore
}

export type InfraServices = {
  configStore: ConfigStore

  /** Set when the store lives in Postgres; the pool is opened lazily. */
  postgres: PostgresClients | null
}

/**
 * Connection settings from the canonical URL's components. Credentials may
 * hold characters a connection-string parser rejects, so pg never sees the URL.
 */
export function toPoolConfig(databaseUrl: string, logger?: Logger): PoolConfig {
  const parts = parseDatabaseUrl(databaseUrl, logger)

  return {
    host: parts.host,
    ...(parts.port ? { port: Number(parts.port) } : {}),
    ...(parts.username ? { user: parts.username } : {}),
    ...(parts.password ? { password: parts.password } : {}),
    ...(parts.schema ? { database: parts.schema } : {}),
  }
}

export function createInfraServices(
  config: Pick<ConfigurationBag, "configStore" | "databaseUrl">,
  core: CoreServices,
): InfraServices {
  switch (config.configStore) {
    case "memory":
      return { configStore: new MemoryConfigStore({ clock: core.clock }), postgres: null }
    case "postgres": {
      const pool = PostgresConfigStore.createPool(toPoolConfig(config.databaseUrl, core.logger))
      const store = PostgresConfigStore.fromPool(pool)

      return { configStore: store, postgres: { pool, store } }
    }
  }
}
