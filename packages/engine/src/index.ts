export { createEngine, createEngineFactory } from "./adapters/binding/create-engine"
export { loadEngineBinding, type ModuleImporter } from "./adapters/binding/load-binding"
export { V2Engine } from "./adapters/binding/v2-engine"
export { V3Engine } from "./adapters/binding/v3-engine"
export { MemoryConfigStore } from "./adapters/memory/memory-config-store"
export { MemoryEngine } from "./adapters/memory/memory-engine"
export { type PgQueryable, PostgresConfigStore } from "./adapters/postgres/postgres-config-store"
export { DocumentConfigBuilder, SNAPSHOT_VERSION } from "./core/config-document"
export {
  ConfigNotFoundError,
  ConfigStoreError,
  EngineError,
  MalformedSnapshotError,
} from "./core/errors"
export type { ConfigBuilder, ConfigDraft, DataSource } from "./ports/config-builder"
export type { ConfigId, ConfigStore, ConfigSummary } from "./ports/config-store"
export type { Engine, EngineFactory } from "./ports/engine"
export {
  DEFAULT_SEARCH_FLAGS,
  type EngineBinding,
  type EngineHandleV2,
  type EngineHandleV3,
} from "./ports/engine-binding"
