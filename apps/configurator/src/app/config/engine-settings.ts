import type { ConfigurationBag } from "./schema"

export type EngineSettingsInput = Pick<
  ConfigurationBag,
  "engineConfigurationJson" | "configPath" | "resourcePath" | "supportPath" | "databaseUrlSpecific"
>

/** The engine's JSON settings: the explicit document when given, else one built from paths. */
export function buildEngineSettings(config: EngineSettingsInput): string {
  if (config.engineConfigurationJson !== null) return config.engineConfigurationJson

  return JSON.stringify({
    PIPELINE: {
      CONFIGPATH: config.configPath,
      RESOURCEPATH: config.resourcePath,
      SUPPORTPATH: config.supportPath ?? "",
    },
    SQL: {
      CONNECTION: config.databaseUrlSpecific ?? "",
    },
  })
}
