import { BaseError } from "@configurator/errors"
import type { HookFailure } from "../lifecycle/lifecycle-hook"

export class ServerError extends BaseError<"server_already_started" | "startup_failed"> {
  static alreadyStarted(): ServerError {
    return new ServerError("Server already started", {
      code: "server_already_started",
      isOperational: false,
    })
  }

  static startupFailed(failures: HookFailure[], timedOut: boolean): ServerError {
    const hooks = failures.map((f) => f.hook)

    return new ServerError(
      timedOut ? "Startup timed out" : `Startup hook failed: ${hooks.join(", ")}`,
      {
        code: "startup_failed",
        context: { hooks, timedOut },
        cause: failures[0]?.error,
      },
    )
  }
}
