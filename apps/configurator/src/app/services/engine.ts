import {
  type ConfigBuilder,
  createEngineFactory,
  DocumentConfigBuilder,
  type Engine,
  type EngineFactory,
  loadEngineBinding,
  MemoryEngine,
} from "@configurator/engine"
import { buildEngineSettings, type ConfigurationBag } from "../config"
import type { InfraServices } from "./infra"

export const ENGINE_NAME = "configurator-engine"

export type EngineServices = {
  builder: ConfigBuilder

  /** Fresh engines, e.g. for validating a candidate configuration. */
  createEngine: EngineFactory

  /** The long-lived engine serving the active configuration. */
  engine: Engine

  /** JSON settings passed to every engine init. */
  settings: string
}

/**
 * Uses the engine module named by `ENGINE_MODULE`, or the in-process
 * memory engine when none is configured.
 */
export async function createEngineServices(
  config: ConfigurationBag,
  infra: Pick<InfraServices, "configStore">,
): Promise<EngineServices> {
  const builder = new DocumentConfigBuilder()

  const createEngine: EngineFactory =
    config.engineModule === null
      ? () => new MemoryEngine({ store: infra.configStore, builder })
      : createEngineFactory(await loadEngineBinding(config.engineModule))

  return {
    builder,
    createEngine,
    engine: createEngine(),
    settings: buildEngineSettings(config),
  }
}
