import { SystemClock, type TimeSource } from "@configurator/clock"
import { ConfigNotFoundError } from "../../core/errors"
import type { ConfigId, ConfigStore, ConfigSummary } from "../../ports/config-store"

type StoredConfig = ConfigSummary & { document: string }

export type MemoryConfigStoreDeps = {
  clock?: TimeSource
}

/** Process-local store. Contents are lost on exit. */
export class MemoryConfigStore implements ConfigStore {
  private readonly configs = new Map<ConfigId, StoredConfig>()
  private readonly clock: TimeSource
  private defaultId: ConfigId | null = null
  private nextId: ConfigId = 1

  constructor(deps: MemoryConfigStoreDeps = {}) {
    this.clock = deps.clock ?? new SystemClock()
  }

  async getDefaultConfigId(): Promise<ConfigId | null> {
    return this.defaultId
  }

  async getConfig(id: ConfigId): Promise<string> {
    return this.require(id).document
  }

  async addConfig(document: string, comment: string): Promise<ConfigId> {
    const id = this.nextId++

    this.configs.set(id, { id, document, comment, createdAt: this.clock.now() })

    return id
  }

  async setDefaultConfigId(id: ConfigId): Promise<void> {
    this.require(id)
    this.defaultId = id
  }

  async listConfigs(): Promise<ConfigSummary[]> {
    return [...this.configs.values()].map(({ id, comment, createdAt }) => ({
      id,
      comment,
      createdAt,
    }))
  }

  private require(id: ConfigId): StoredConfig {
    const stored = this.configs.get(id)
    if (!stored) throw ConfigNotFoundError.forId(id)

    return stored
  }
}
