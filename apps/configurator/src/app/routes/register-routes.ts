import type { Application } from "@configurator/server"
import { createDatasourcesModule } from "../../domains/datasources"
import type { DomainServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, services: DomainServices): void {
  const modules: ApiModule[] = [createDatasourcesModule({ datasources: services.datasources })]

  for (const m of modules) {
    m.register(app)
  }
}

export type RegisterRoutesFn = typeof registerRoutes
