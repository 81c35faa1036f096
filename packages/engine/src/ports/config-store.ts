/** Store-assigned snapshot id. */
export type ConfigId = number

export interface ConfigSummary {
  id: ConfigId
  comment: string
  createdAt: Date
}

/**
 * Versioned snapshot storage plus the default pointer. Snapshots are
 * immutable once added; only the pointer moves.
 */
export interface ConfigStore {
  /** `null` until a default has been set. */
  getDefaultConfigId(): Promise<ConfigId | null>

  /** Throws `ConfigNotFoundError` for an unknown id. */
  getConfig(id: ConfigId): Promise<string>

  addConfig(document: string, comment: string): Promise<ConfigId>

  /** Throws `ConfigNotFoundError` for an unknown id. */
  setDefaultConfigId(id: ConfigId): Promise<void>

  /** Oldest first. */
  listConfigs(): Promise<ConfigSummary[]>
}
