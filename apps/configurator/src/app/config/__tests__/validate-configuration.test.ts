import { ConfigError } from "@configurator/config"
import { validateConfiguration } from "../validate-configuration"

describe("validateConfiguration", () => {
  const valid = {
    supportPath: "/opt/configurator/data",
    databaseUrlSpecific: "sqlite3://na:na@/tmp/G2C.db",
    engineConfigurationJson: null,
  }

  it("accepts a support path with a dialect URL", () => {
    expect(() => validateConfiguration(valid)).not.toThrow()
  })

  it("accepts explicit engine settings in place of a dialect URL", () => {
    expect(() =>
      validateConfiguration({ ...valid, databaseUrlSpecific: null, engineConfigurationJson: "{}" }),
    ).not.toThrow()
  })

  it("lists every missing value", () => {
    let caught: unknown

    try {
      validateConfiguration({
        supportPath: null,
        databaseUrlSpecific: null,
        engineConfigurationJson: null,
      })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(ConfigError)
    expect(caught).toMatchObject({
      code: "invalid_configuration",
      context: {
        issues: [
          { path: "SUPPORT_PATH", message: "A support path is required" },
          {
            path: "DATABASE_URL",
            message: "Either a usable database URL or ENGINE_CONFIGURATION_JSON is required",
          },
        ],
      },
    })
  })
})
