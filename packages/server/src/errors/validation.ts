import { BaseError, type ErrorContext } from "@configurator/errors"
import type { z } from "zod"

export type ValidationIssue = { path: string; message: string }

export type ValidationErrorContext = ErrorContext & { issues: ValidationIssue[] }

type IssueLike = { path: PropertyKey[]; message: string }

function formatPath(path: PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  declare readonly context: ValidationErrorContext

  static fromIssues(raw: readonly IssueLike[]): ValidationError {
    const issues = raw.map((i) => ({ path: formatPath(i.path), message: i.message }))

    return new ValidationError(issues[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues },
    })
  }
}

/** Parses with `schema`, turning schema failures into a `ValidationError`. */
export function parseOrThrow<S extends z.ZodType>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data)

  if (!result.success) throw ValidationError.fromIssues(result.error.issues)

  return result.data
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
