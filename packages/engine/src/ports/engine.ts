import type { ConfigId } from "./config-store"

/**
 * The matching engine as the configurator sees it. `settings` is the
 * engine's JSON settings document.
 */
export interface Engine {
  /** Starts on the store's default configuration. */
  init(name: string, settings: string, debug: boolean): Promise<void>

  initWithConfigId(name: string, settings: string, id: ConfigId, debug: boolean): Promise<void>

  /** Switches a running engine to `id`. */
  reinit(id: ConfigId): Promise<void>

  /** Returns the engine's JSON response. */
  searchByAttributes(query: string): Promise<string>

  getActiveConfigId(): Promise<ConfigId>

  destroy(): Promise<void>
}

/** Each call returns a fresh, uninitialized engine. */
export type EngineFactory = () => Engine
