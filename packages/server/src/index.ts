export type { ErrorHandler } from "./errors/create-error-handler"
export type { ErrorMapping, ErrorMappingsConfig, ErrorResponse } from "./errors/errors"
export { ServerError } from "./errors/server-error"
export {
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors/validation"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type {
  LifecycleHook,
  LifecycleHookContext,
  PhaseResult,
} from "./lifecycle/lifecycle-hook"
export {
  type Application,
  type Context,
  createRouter,
  createServer,
  type Middleware,
  type RequestHandler,
  Server,
  type ServerCollaborators,
} from "./server/server"
export type {
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
