import { type ConfigurationBag, resolveConfiguration } from "./config"
import {
  type CreateStartHooksFn,
  type CreateStopHooksFn,
  createStartHooks,
  createStopHooks,
} from "./lifecycle"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { createDefaultDomainServices, type DomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createEngineServices, type EngineServices } from "./services/engine"
import { createInfraServices, type InfraServices } from "./services/infra"

export type AppContextOptions = {
  /** Resolved configuration. Resolved from `env` when omitted. */
  config?: ConfigurationBag
  env?: Record<string, string | undefined>
  cwd?: string

  coreOverrides?: Partial<CoreServices>
  infraOverrides?: Partial<InfraServices>
  engineOverrides?: Partial<EngineServices>
  domainOverrides?: Partial<DomainServices>
}

export type AppContext = {
  config: ConfigurationBag
  infra: InfraServices
  engine: EngineServices
  services: {
    core: CoreServices
    domains: DomainServices
  }
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

/** Builds every long-lived handle once. Nothing connects until the start hooks run. */
export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config =
    options.config ??
    (await resolveConfiguration({
      ...(options.env && { env: options.env }),
      ...(options.cwd && { cwd: options.cwd }),
    }))

  const core = { ...createCoreServices(config), ...options.coreOverrides }
  const infra = { ...createInfraServices(config, core), ...options.infraOverrides }
  const engine = { ...(await createEngineServices(config, infra)), ...options.engineOverrides }
  const domains = {
    ...createDefaultDomainServices(config, core, infra, engine),
    ...options.domainOverrides,
  }

  return {
    config,
    infra,
    engine,
    services: { core, domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
