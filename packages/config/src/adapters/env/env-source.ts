import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys with this prefix are read; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.env, this.prefix)
  }
}

export function stripPrefix(
  values: Record<string, string | undefined>,
  prefix: string,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}
