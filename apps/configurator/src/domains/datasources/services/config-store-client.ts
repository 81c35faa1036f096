import type {
  ConfigBuilder,
  ConfigDraft,
  ConfigId,
  ConfigStore,
  Engine,
  EngineFactory,
} from "@configurator/engine"
import { type Lock, withLock } from "@configurator/lock"
import type { Logger } from "@configurator/logger"
import type {
  AddDataSourcesResult,
  DataSourceCode,
  PersistOutcome,
} from "../model/datasource.model"

/** Guards every read-modify-commit of the default configuration. */
export const DEFAULT_CONFIG_LOCK_KEY = "config:default"

export const VALIDATION_ENGINE_NAME = "configurator-validation"

/** Smallest search that proves an engine can answer on a configuration. */
const VALIDATION_QUERY = "{}"

export type ConfigStoreClientDeps = {
  store: ConfigStore
  builder: ConfigBuilder

  /** The live engine, switched to each activated configuration. */
  engine: Engine
  createEngine: EngineFactory
  lock: Lock
  logger: Logger
}

export type ConfigStoreClientOptions = {
  engineSettings: string
  debug: boolean
}

type Current = {
  id: ConfigId | null
  draft: ConfigDraft
}

type Validation = { ok: true } | { ok: false; err: unknown }

/**
 * Reads and extends the data source registry of the active configuration.
 * Additions are stored as a new configuration, proven on a throwaway engine,
 * and only then made the default.
 */
export class ConfigStoreClient {
  constructor(
    private readonly deps: ConfigStoreClientDeps,
    private readonly opts: ConfigStoreClientOptions,
  ) {}

  /** Codes of the default configuration; empty before one exists. */
  async listDataSources(): Promise<DataSourceCode[]> {
    const { draft } = await this.loadCurrent()

    return draft.listDataSources()
  }

  async addDataSources(codes: readonly DataSourceCode[]): Promise<AddDataSourcesResult> {
    return withLock(this.deps.lock, DEFAULT_CONFIG_LOCK_KEY, async () => {
      const { id, draft } = await this.loadCurrent()
      const existing: DataSourceCode[] = []
      const created: DataSourceCode[] = []

      for (const code of new Set(codes)) {
        if (draft.hasDataSource(code)) {
          existing.push(code)
          continue
        }

        const added = draft.addDataSource(code)
        created.push(code)
        this.deps.logger.info("Adding data source", { code, dataSourceId: added.id })
      }

      if (created.length === 0) return { existing, created, configId: id, activated: true }

      const comment = `Configuration ${id ?? "none"} plus data sources: ${created.join(", ")}`
      const outcome = await this.persist(draft, comment)

      return { existing, created, ...outcome }
    })
  }

  /**
   * Stores `draft` as a new configuration and activates it if an engine can
   * start on it. A configuration that fails stays stored but inactive.
   */
  async persist(draft: ConfigDraft, comment: string): Promise<PersistOutcome> {
    const configId = await this.deps.store.addConfig(draft.serialize(), comment)
    const validation = await this.validate(configId)

    if (!validation.ok) {
      this.deps.logger.warn("Configuration failed validation; default left unchanged", {
        configId,
        err: validation.err,
      })

      return { configId, activated: false }
    }

    await this.deps.store.setDefaultConfigId(configId)
    await this.deps.engine.reinit(configId)

    this.deps.logger.info("Activated configuration", { configId, comment })

    return { configId, activated: true }
  }

  private async validate(configId: ConfigId): Promise<Validation> {
    const probe = this.deps.createEngine()

    try {
      await probe.initWithConfigId(
        VALIDATION_ENGINE_NAME,
        this.opts.engineSettings,
        configId,
        this.opts.debug,
      )
      await probe.searchByAttributes(VALIDATION_QUERY)

      return { ok: true }
    } catch (err) {
      return { ok: false, err }
    } finally {
      await this.destroyProbe(probe, configId)
    }
  }

  private async destroyProbe(probe: Engine, configId: ConfigId): Promise<void> {
    try {
      await probe.destroy()
    } catch (err) {
      this.deps.logger.warn("Could not destroy validation engine", { configId, err })
    }
  }

  private async loadCurrent(): Promise<Current> {
    const id = await this.deps.store.getDefaultConfigId()

    if (id === null) return { id, draft: this.deps.builder.create() }

    return { id, draft: this.deps.builder.load(await this.deps.store.getConfig(id)) }
  }
}
