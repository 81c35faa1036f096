import type { ConfigId } from "@configurator/engine"

/** Case-sensitive data source identifier, e.g. `"CUSTOMER"`. */
export type DataSourceCode = string

export type AddDataSourcesResult = {
  /** Requested codes the active configuration already had. */
  existing: DataSourceCode[]

  /** Codes registered by this call, in request order. */
  created: DataSourceCode[]

  /** The configuration holding every requested code; `null` when none was ever stored. */
  configId: ConfigId | null

  /** False when the new configuration failed validation and was left inactive. */
  activated: boolean
}

export type PersistOutcome = {
  configId: ConfigId
  activated: boolean
}

export type InitializerState = "uninitialized" | "initialized"
