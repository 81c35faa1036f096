import type { ConfigBuilder, ConfigId, ConfigStore } from "@configurator/engine"
import { type Lock, withLock } from "@configurator/lock"
import type { Logger } from "@configurator/logger"
import { BootstrapError } from "../model/datasource.errors"
import type { InitializerState } from "../model/datasource.model"
import { DEFAULT_CONFIG_LOCK_KEY } from "./config-store-client"

export const INITIAL_CONFIG_COMMENT = "Initial configuration."

export type DefaultConfigInitializerDeps = {
  store: ConfigStore
  builder: ConfigBuilder
  lock: Lock
  logger: Logger
}

/**
 * Makes sure the store has a default configuration. The first run on an
 * empty store stores an empty configuration and points the default at it
 * without validation, since there is nothing older to fall back to.
 */
export class DefaultConfigInitializer {
  private state: InitializerState = "uninitialized"

  constructor(private readonly deps: DefaultConfigInitializerDeps) {}

  getState(): InitializerState {
    return this.state
  }

  /**
   * @returns the default configuration id.
   * @throws BootstrapError when the store fails.
   */
  async initialize(): Promise<ConfigId> {
    try {
      const id = await withLock(this.deps.lock, DEFAULT_CONFIG_LOCK_KEY, () => this.ensureDefault())
      this.state = "initialized"

      return id
    } catch (err) {
      throw err instanceof BootstrapError ? err : BootstrapError.storeFailed(err)
    }
  }

  private async ensureDefault(): Promise<ConfigId> {
    const existing = await this.deps.store.getDefaultConfigId()

    if (existing !== null) {
      this.deps.logger.debug("Default configuration present", { configId: existing })
      return existing
    }

    const document = this.deps.builder.create().serialize()
    const id = await this.deps.store.addConfig(document, INITIAL_CONFIG_COMMENT)
    await this.deps.store.setDefaultConfigId(id)

    this.deps.logger.info("Created initial configuration", { configId: id })

    return id
  }
}
