import { EngineError } from "../../core/errors"
import type { ConfigId } from "../../ports/config-store"
import type { Engine } from "../../ports/engine"
import { DEFAULT_SEARCH_FLAGS, type EngineHandleV2 } from "../../ports/engine-binding"

export class V2Engine implements Engine {
  constructor(private readonly handle: EngineHandleV2) {}

  init(name: string, settings: string, debug: boolean): Promise<void> {
    return guard("init", () => this.handle.init(name, settings, debug))
  }

  initWithConfigId(name: string, settings: string, id: ConfigId, debug: boolean): Promise<void> {
    return guard("initWithConfigId", () =>
      this.handle.initWithConfigID(name, settings, id, debug),
    )
  }

  reinit(id: ConfigId): Promise<void> {
    return guard("reinit", () => this.handle.reinit(id))
  }

  searchByAttributes(query: string): Promise<string> {
    return guard("searchByAttributes", () =>
      this.handle.searchByAttributesV2(query, DEFAULT_SEARCH_FLAGS),
    )
  }

  getActiveConfigId(): Promise<ConfigId> {
    return guard("getActiveConfigId", () => this.handle.getActiveConfigID())
  }

  destroy(): Promise<void> {
    return guard("destroy", () => this.handle.destroy())
  }
}

export async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (err instanceof EngineError) throw err
    throw EngineError.failed(operation, err)
  }
}
