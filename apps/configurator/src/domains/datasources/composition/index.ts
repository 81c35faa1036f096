import type { ConfigurationBag } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { EngineServices } from "../../../app/services/engine"
import type { InfraServices } from "../../../app/services/infra"
import { ConfigStoreClient } from "../services/config-store-client"
import { DefaultConfigInitializer } from "../services/default-config-initializer"

export type DatasourceServices = {
  configStoreClient: ConfigStoreClient
  initializer: DefaultConfigInitializer
}

export function createDatasourceServices(
  config: Pick<ConfigurationBag, "debug">,
  core: CoreServices,
  infra: Pick<InfraServices, "configStore">,
  engine: EngineServices,
): DatasourceServices {
  const logger = core.logger.child({ component: "datasources" })

  const configStoreClient = new ConfigStoreClient(
    {
      store: infra.configStore,
      builder: engine.builder,
      engine: engine.engine,
      createEngine: engine.createEngine,
      lock: core.lock,
      logger,
    },
    { engineSettings: engine.settings, debug: config.debug },
  )

  const initializer = new DefaultConfigInitializer({
    store: infra.configStore,
    builder: engine.builder,
    lock: core.lock,
    logger,
  })

  return { configStoreClient, initializer }
}
