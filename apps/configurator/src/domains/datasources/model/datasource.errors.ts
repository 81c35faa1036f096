import { BaseError } from "@configurator/errors"

export class BootstrapError extends BaseError<"bootstrap_failed"> {
  static storeFailed(cause: unknown): BootstrapError {
    return new BootstrapError("Could not create the initial configuration", {
      code: "bootstrap_failed",
      cause,
      isOperational: false,
    })
  }
}
