import {
  createDatasourceServices,
  type DatasourceServices,
} from "../../domains/datasources/composition"
import type { ConfigurationBag } from "../config"
import type { CoreServices } from "./core"
import type { EngineServices } from "./engine"
import type { InfraServices } from "./infra"

export type DomainServices = {
  datasources: DatasourceServices
}

export function createDefaultDomainServices(
  config: ConfigurationBag,
  core: CoreServices,
  infra: InfraServices,
  engine: EngineServices,
): DomainServices {
  return {
    datasources: createDatasourceServices(config, core, infra, engine),
  }
}
