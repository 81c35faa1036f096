import { type Context, parseOrThrow, type RequestHandler, ValidationError } from "@configurator/server"
import type { DatasourceServices } from "../composition"
import {
  type AddDatasourcesResponse,
  addDatasourcesRequestSchema,
  CONFIGURATION_ACTIVATED_HEADER,
} from "./datasources.api.schema"

/**
 * Always 201 once the body is valid. A configuration that fails validation is
 * kept inactive; the header reports whether the default moved.
 */
export function addDatasourcesHandler({ configStoreClient }: DatasourceServices): RequestHandler {
  return async (c: Context) => {
    const codes = parseOrThrow(addDatasourcesRequestSchema, await readJson(c))

    const result = await configStoreClient.addDataSources(codes)

    const body: AddDatasourcesResponse = {
      existingDatasources: result.existing,
      createdDatasources: result.created,
    }

    c.header(CONFIGURATION_ACTIVATED_HEADER, String(result.activated))

    return c.json(body, 201)
  }
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch {
    throw ValidationError.fromIssues([{ path: [], message: "Request body must be JSON" }])
  }
}
