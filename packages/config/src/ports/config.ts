/**
 * Validated configuration together with where each value came from.
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenance labels, in first-seen order. */
  sourcesUsed(): string[]

  /** Keys supplied by sources that the schema does not declare. */
  unknownKeys(): string[]
}
