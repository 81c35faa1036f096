import type { Logger } from "@configurator/logger"

export type ServerContextVariables = {
  requestId: string
  logger: Logger
}

declare module "hono" {
  interface ContextVariableMap extends ServerContextVariables {}
}
