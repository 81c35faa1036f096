export interface DataSource {
  id: number
  code: string
}

/** A mutable working copy of one snapshot document. */
export interface ConfigDraft {
  /** Codes in registration order. */
  listDataSources(): string[]

  hasDataSource(code: string): boolean

  /** Registers `code`, or returns the existing entry when already present. */
  addDataSource(code: string): DataSource

  serialize(): string
}

export interface ConfigBuilder {
  /** A draft with no data sources. */
  create(): ConfigDraft

  /** Throws `MalformedSnapshotError` when `document` is not a snapshot. */
  load(document: string): ConfigDraft
}
