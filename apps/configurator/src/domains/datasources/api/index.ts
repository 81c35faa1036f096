import { type Application, createRouter } from "@configurator/server"
import type { DatasourceServices } from "../composition"
import { addDatasourcesHandler } from "./add-datasources.handler"
import { listDatasourcesHandler } from "./list-datasources.handler"

type DatasourcesModuleDeps = {
  datasources: DatasourceServices
}

export function createDatasourcesModule(deps: DatasourcesModuleDeps) {
  return {
    name: "datasources",
    register: (app: Application) => {
      const datasources = createRouter()

      datasources.get("/", listDatasourcesHandler(deps.datasources))
      datasources.post("/", addDatasourcesHandler(deps.datasources))

      app.route("/datasources", datasources)
    },
  }
}
