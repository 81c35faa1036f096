import { BaseError } from "@configurator/errors"

export type ConfigErrorCode = "invalid_configuration"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, issues: ReadonlyArray<{ path: string; message: string }>) {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_configuration",
      context: { issues },
      isOperational: true,
    })
  }
}
