import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly suppliedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(data)
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  unknownKeys(): string[] {
    const declared = new Set(Object.keys(this.data))

    return [...this.suppliedKeys].filter((key) => !declared.has(key))
  }
}
