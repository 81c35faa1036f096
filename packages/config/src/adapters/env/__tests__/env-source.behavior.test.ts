import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns every variable without a prefix", async () => {
    const source = new EnvSource({ env: { PORT: "8253", DEBUG: "yes" } })

    expect(await source.load()).toEqual({ PORT: "8253", DEBUG: "yes" })
  })

  it("filters by prefix and strips it", async () => {
    const source = new EnvSource({
      prefix: "CONFIGURATOR_",
      env: {
        CONFIGURATOR_DATABASE_URL: "sqlite3://na:na@/tmp/G2C.db",
        CONFIGURATOR_DEBUG: "1",
        PATH: "/usr/bin",
      },
    })

    expect(await source.load()).toEqual({
      DATABASE_URL: "sqlite3://na:na@/tmp/G2C.db",
      DEBUG: "1",
    })
  })

  it("reads process.env when no env is injected", async () => {
    vi.stubEnv("CONFIGURATOR_SUBCOMMAND", "version")

    try {
      const result = await new EnvSource({ prefix: "CONFIGURATOR_" }).load()

      expect(result["SUBCOMMAND"]).toBe("version")
    } finally {
      vi.unstubAllEnvs()
    }
  })
})
