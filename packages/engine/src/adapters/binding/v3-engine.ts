import type { ConfigId } from "../../ports/config-store"
import type { Engine } from "../../ports/engine"
import { DEFAULT_SEARCH_FLAGS, type EngineHandleV3 } from "../../ports/engine-binding"
import { guard } from "./v2-engine"

/** v3 folds both init variants into `initialize` and renames reinit. */
export class V3Engine implements Engine {
  constructor(private readonly handle: EngineHandleV3) {}

  init(name: string, settings: string, debug: boolean): Promise<void> {
    return guard("init", () => this.handle.initialize(name, settings, debug))
  }

  initWithConfigId(name: string, settings: string, id: ConfigId, debug: boolean): Promise<void> {
    return guard("initWithConfigId", () => this.handle.initialize(name, settings, debug, id))
  }

  reinit(id: ConfigId): Promise<void> {
    return guard("reinit", () => this.handle.reinitialize(id))
  }

  searchByAttributes(query: string): Promise<string> {
    return guard("searchByAttributes", () =>
      this.handle.searchByAttributes(query, DEFAULT_SEARCH_FLAGS),
    )
  }

  getActiveConfigId(): Promise<ConfigId> {
    return guard("getActiveConfigId", () => this.handle.getActiveConfigId())
  }

  destroy(): Promise<void> {
    return guard("destroy", () => this.handle.destroy())
  }
}
