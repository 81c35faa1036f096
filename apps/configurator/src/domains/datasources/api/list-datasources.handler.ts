import type { Context, RequestHandler } from "@configurator/server"
import type { DatasourceServices } from "../composition"

export function listDatasourcesHandler({ configStoreClient }: DatasourceServices): RequestHandler {
  return async (c: Context) => {
    const codes = await configStoreClient.listDataSources()

    return c.json([...codes].sort())
  }
}
