import { BaseError } from "@configurator/errors"
import type { ConfigId } from "../ports/config-store"

export class ConfigStoreError extends BaseError<"config_store_unavailable"> {
  static unavailable(operation: string, cause: unknown): ConfigStoreError {
    return new ConfigStoreError(`Config store ${operation} failed`, {
      code: "config_store_unavailable",
      context: { operation },
      cause,
      isRetryable: true,
    })
  }
}

export class ConfigNotFoundError extends BaseError<"config_not_found"> {
  static forId(id: ConfigId): ConfigNotFoundError {
    return new ConfigNotFoundError(`Configuration ${id} does not exist`, {
      code: "config_not_found",
      context: { id },
    })
  }
}

export class MalformedSnapshotError extends BaseError<"malformed_snapshot"> {
  static fromIssues(summary: string, cause?: unknown): MalformedSnapshotError {
    return new MalformedSnapshotError(`Malformed configuration snapshot: ${summary}`, {
      code: "malformed_snapshot",
      cause,
      isOperational: false,
    })
  }
}

export class EngineError extends BaseError<
  "engine_error" | "engine_not_initialized" | "engine_binding_invalid"
> {
  static failed(operation: string, cause: unknown): EngineError {
    return new EngineError(`Engine ${operation} failed`, {
      code: "engine_error",
      context: { operation },
      cause,
    })
  }

  static notInitialized(operation: string): EngineError {
    return new EngineError(`Engine ${operation} called before init`, {
      code: "engine_not_initialized",
      context: { operation },
      isOperational: false,
    })
  }

  static bindingInvalid(specifier: string, reason: string): EngineError {
    return new EngineError(`Engine module "${specifier}" is not a usable binding: ${reason}`, {
      code: "engine_binding_invalid",
      context: { specifier, reason },
    })
  }
}
