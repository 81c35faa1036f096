import { EngineError } from "../../core/errors"
import type { ConfigBuilder } from "../../ports/config-builder"
import type { ConfigId, ConfigStore } from "../../ports/config-store"
import type { Engine } from "../../ports/engine"

export type MemoryEngineDeps = {
  store: ConfigStore
  builder: ConfigBuilder
}

type Running = { name: string; configId: ConfigId }

/**
 * In-process engine. It loads snapshots through the store and builder, so a
 * snapshot the builder rejects fails `initWithConfigId` and `reinit`. Search
 * answers an empty result set.
 */
export class MemoryEngine implements Engine {
  private running: Running | null = null

  constructor(private readonly deps: MemoryEngineDeps) {}

  async init(name: string, settings: string, _debug: boolean): Promise<void> {
    parseSettings(settings)

    const id = await this.call("init", () => this.deps.store.getDefaultConfigId())
    if (id === null) throw EngineError.failed("init", new Error("no default configuration"))

    this.running = await this.load(name, id, "init")
  }

  async initWithConfigId(
    name: string,
    settings: string,
    id: ConfigId,
    _debug: boolean,
  ): Promise<void> {
    parseSettings(settings)

    this.running = await this.load(name, id, "initWithConfigId")
  }

  async reinit(id: ConfigId): Promise<void> {
    const current = this.require("reinit")

    this.running = await this.load(current.name, id, "reinit")
  }

  async searchByAttributes(query: string): Promise<string> {
    this.require("searchByAttributes")

    try {
      JSON.parse(query)
    } catch (err) {
      throw EngineError.failed("searchByAttributes", err)
    }

    return JSON.stringify({ RESOLVED_ENTITIES: [] })
  }

  async getActiveConfigId(): Promise<ConfigId> {
    return this.require("getActiveConfigId").configId
  }

  async destroy(): Promise<void> {
    this.running = null
  }

  private async load(name: string, configId: ConfigId, operation: string): Promise<Running> {
    await this.call(operation, async () => {
      this.deps.builder.load(await this.deps.store.getConfig(configId))
    })

    return { name, configId }
  }

  private require(operation: string): Running {
    if (!this.running) throw EngineError.notInitialized(operation)

    return this.running
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw EngineError.failed(operation, err)
    }
  }
}

function parseSettings(settings: string): void {
  try {
    JSON.parse(settings)
  } catch (err) {
    throw EngineError.failed("init", err)
  }
}
