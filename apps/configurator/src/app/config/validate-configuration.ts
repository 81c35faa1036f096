import { ConfigError } from "@configurator/config"
import type { ConfigurationBag } from "./schema"

type Issue = { path: string; message: string }

/**
 * Checks what the `service` subcommand needs before it may serve.
 *
 * @throws ConfigError listing every missing value.
 */
export function validateConfiguration(
  config: Pick<ConfigurationBag, "supportPath" | "databaseUrlSpecific" | "engineConfigurationJson">,
): void {
  const issues: Issue[] = []

  if (config.supportPath === null) {
    issues.push({ path: "SUPPORT_PATH", message: "A support path is required" })
  }

  if (config.databaseUrlSpecific === null && config.engineConfigurationJson === null) {
    issues.push({
      path: "DATABASE_URL",
      message: "Either a usable database URL or ENGINE_CONFIGURATION_JSON is required",
    })
  }

  if (issues.length > 0) {
    throw ConfigError.invalid(
      issues.map((issue) => `${issue.path}: ${issue.message}`).join("\n"),
      issues,
    )
  }
}
