import type { ConfigSource } from "../../ports/source"

/** In-memory values such as parsed command line flags. Undefined entries are left out. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name: string = "object",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return Object.fromEntries(Object.entries(this.values).filter(([, v]) => v !== undefined))
  }
}
