import { z } from "zod"

export const addDatasourcesRequestSchema = z.array(
  z.string().min(1, { error: "Data source code cannot be empty" }),
  { error: "Expected an array of data source codes" },
)

export type AddDatasourcesRequest = z.infer<typeof addDatasourcesRequestSchema>

export type AddDatasourcesResponse = {
  existingDatasources: string[]
  createdDatasources: string[]
}

/** `"true"` when the default configuration now holds the request, `"false"` when it was left unchanged. */
export const CONFIGURATION_ACTIVATED_HEADER = "X-Configuration-Activated"
