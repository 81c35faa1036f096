import type { ConfigId } from "./config-store"

/** Search flags passed to every binding search; the default response shape. */
export const DEFAULT_SEARCH_FLAGS = 0

export interface EngineHandleV2 {
  init(name: string, settings: string, debug: boolean): Promise<void>
  initWithConfigID(name: string, settings: string, id: ConfigId, debug: boolean): Promise<void>
  reinit(id: ConfigId): Promise<void>
  searchByAttributesV2(attributes: string, flags: number): Promise<string>
  getActiveConfigID(): Promise<ConfigId>
  destroy(): Promise<void>
}

export interface EngineHandleV3 {
  initialize(name: string, settings: string, debug: boolean, configId?: ConfigId): Promise<void>
  reinitialize(id: ConfigId): Promise<void>
  searchByAttributes(attributes: string, flags: number): Promise<string>
  getActiveConfigId(): Promise<ConfigId>
  destroy(): Promise<void>
}

/** What an engine module exports. */
export type EngineBinding =
  | { sdkVersionMajor: 2; createEngine: () => EngineHandleV2 }
  | { sdkVersionMajor: 3; createEngine: () => EngineHandleV3 }
