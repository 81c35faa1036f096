import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError } from "@configurator/config"
import { UnknownSchemeError } from "@configurator/dburl"
import type { Logger } from "@configurator/logger"
import { mock } from "vitest-mock-extended"
import { resolveConfiguration } from "../resolve-configuration"

describe("resolveConfiguration", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "configurator-resolve-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("fills every key from defaults", async () => {
    const config = await resolveConfiguration({ env: {}, cwd })

    expect(config).toEqual({
      subcommand: null,
      debug: false,
      dockerLaunched: false,
      configPath: "/etc/opt/configurator",
      resourcePath: "/opt/configurator/resources",
      supportPath: "/opt/configurator/data",
      engineConfigurationJson: null,
      engineModule: null,
      databaseUrl: "sqlite3://na:na@/var/opt/configurator/sqlite/G2C.db",
      databaseUrlSpecific: "sqlite3://na:na@/var/opt/configurator/sqlite/G2C.db",
      internalDatabase: null,
      internalDatabaseSeed: "/opt/configurator/resources/templates/G2C.db",
      configStore: "memory",
      host: "0.0.0.0",
      port: 8253,
      shutdownTimeoutMs: 10_000,
      sleepTimeInSeconds: 0,
      logLevel: "info",
      logPretty: false,
    })
  })

  it("lets flags beat the environment and the environment beat .env", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "CONFIGURATOR_PORT=7000\nCONFIGURATOR_HOST=10.0.0.1\n",
    )

    const config = await resolveConfiguration({
      env: { CONFIGURATOR_PORT: "7100", CONFIGURATOR_DEBUG: "yes", PORT: "9999" },
      cliOverrides: { PORT: "7200" },
      cwd,
    })

    expect(config.port).toBe(7200)
    expect(config.host).toBe("10.0.0.1")
    expect(config.debug).toBe(true)
  })

  it("takes the positional subcommand over the environment", async () => {
    const config = await resolveConfiguration({
      env: { CONFIGURATOR_SUBCOMMAND: "sleep" },
      subcommand: "service",
      cwd,
    })

    expect(config.subcommand).toBe("service")
  })

  it.each([
    ["TRUE", true],
    ["1", true],
    ["t", true],
    ["Y", true],
    ["yes", true],
    ["no", false],
    ["0", false],
    ["", false],
  ])("reads debug %j as %s", async (raw, expected) => {
    const config = await resolveConfiguration({ env: { CONFIGURATOR_DEBUG: raw }, cwd })

    expect(config.debug).toBe(expected)
  })

  it("accepts a boolean flag value", async () => {
    const config = await resolveConfiguration({ env: {}, cliOverrides: { DEBUG: true }, cwd })

    expect(config.debug).toBe(true)
  })

  it("fails on a non-numeric integer", async () => {
    const attempt = resolveConfiguration({ env: { CONFIGURATOR_PORT: "eighty" }, cwd })

    await expect(attempt).rejects.toBeInstanceOf(ConfigError)
    await expect(attempt).rejects.toMatchObject({
      code: "invalid_configuration",
      context: { issues: [{ path: "PORT" }] },
    })
  })

  it("falls back to defaults for blank values", async () => {
    const config = await resolveConfiguration({
      env: {
        CONFIGURATOR_PORT: "",
        CONFIGURATOR_SLEEP_TIME_IN_SECONDS: "  ",
        CONFIGURATOR_HOST: "",
      },
      cwd,
    })

    expect(config.port).toBe(8253)
    expect(config.sleepTimeInSeconds).toBe(0)
    expect(config.host).toBe("0.0.0.0")
  })

  it("trims whitespace around an integer", async () => {
    const config = await resolveConfiguration({ env: { CONFIGURATOR_PORT: " 8080 " }, cwd })

    expect(config.port).toBe(8080)
  })

  it.each(["0x10", "1e3", "-1", "12.5"])("fails on integer %j", async (raw) => {
    const attempt = resolveConfiguration({ env: { CONFIGURATOR_SHUTDOWN_TIMEOUT_MS: raw }, cwd })

    await expect(attempt).rejects.toMatchObject({
      code: "invalid_configuration",
      context: { issues: [{ path: "SHUTDOWN_TIMEOUT_MS" }] },
    })
  })

  it("maps legacy level names", async () => {
    const config = await resolveConfiguration({ env: { CONFIGURATOR_LOG_LEVEL: "WARNING" }, cwd })

    expect(config.logLevel).toBe("warn")
  })

  it("makes relative paths absolute", async () => {
    const config = await resolveConfiguration({
      env: { CONFIGURATOR_SUPPORT_PATH: "data", CONFIGURATOR_CONFIG_PATH: "./etc" },
      cwd,
    })

    expect(config.supportPath).toBe(path.join(cwd, "data"))
    expect(config.configPath).toBe(path.join(cwd, "etc"))
  })

  it("treats an empty support path as missing", async () => {
    const config = await resolveConfiguration({ env: { CONFIGURATOR_SUPPORT_PATH: "" }, cwd })

    expect(config.supportPath).toBeNull()
  })

  it("seeds an internal database and addresses it directly", async () => {
    await fs.writeFile(path.join(cwd, "seed.db"), "seed")
    const env = {
      CONFIGURATOR_INTERNAL_DATABASE: "nested/dir/G2C.db",
      CONFIGURATOR_INTERNAL_DATABASE_SEED: "seed.db",
      CONFIGURATOR_DATABASE_URL: "oracle://ignored",
    }
    const target = path.join(cwd, "nested/dir/G2C.db")

    await resolveConfiguration({ env, cwd })
    const config = await resolveConfiguration({ env, cwd })

    expect(config.internalDatabase).toBe(target)
    expect(config.databaseUrlSpecific).toBe(`sqlite3://na:na@${target}`)
    expect(await fs.readFile(target, "utf-8")).toBe("seed")
  })

  it("logs and leaves the dialect URL unset when the URL cannot be transcoded", async () => {
    const logger = mock<Logger>()

    const config = await resolveConfiguration(
      { env: { CONFIGURATOR_DATABASE_URL: "oracle://matcher:test-secret@db:1521/records" }, cwd },
      { logger },
    )

    expect(config.databaseUrlSpecific).toBeNull()
    expect(logger.error).toHaveBeenCalledWith("Could not derive the dialect database URL", {
      err: expect.any(UnknownSchemeError),
    })
  })
})
