import type { Middleware } from "../server/server"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

/**
 * Takes the request id from the configured header or generates one, stores
 * it on the context and echoes it on the response.
 */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): Middleware {
  const header = config.header.toLowerCase()

  return async (c, next) => {
    const incoming = c.req.header(header)
    const requestId = isNonEmptyString(incoming) ? incoming : config.generate()

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, header, requestId)
  }
}
