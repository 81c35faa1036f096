import { BaseError } from "@configurator/errors"

// Error contexts never carry the URL itself: it holds credentials.

export class UnknownSchemeError extends BaseError<"unknown_database_scheme"> {
  constructor(scheme: string) {
    super(`Unknown database scheme "${scheme}"`, {
      code: "unknown_database_scheme",
      context: { scheme },
    })
  }
}

export class InsufficientSafeCharactersError extends BaseError<"insufficient_safe_characters"> {
  constructor(unsafe: readonly string[], available: number) {
    super(
      `Database URL has ${unsafe.length} distinct unsafe characters but only ${available} substitutes are free`,
      {
        code: "insufficient_safe_characters",
        context: { unsafe: [...unsafe], available },
      },
    )
  }
}
