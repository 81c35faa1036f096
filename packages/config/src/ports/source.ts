/**
 * A layer of raw configuration values.
 *
 * Sources only load. Validation and coercion happen once, over the merged
 * result, in `loadConfig`. When sources are listed together, later ones win.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `"env"`, `"dotenv:.env"`, `"cli"`. */
  readonly name: string

  /** An `undefined` value means "not provided" and never overrides. */
  load(): Promise<Record<string, unknown>>
}
