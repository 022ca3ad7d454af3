import type { EnabledRequestIdConfig } from "../server/server-options"
import type { Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

/**
 * Takes the request ID from the configured header or generates one, stores it on the
 * context and mirrors it onto the response.
 */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): Middleware {
  const header = config.header.toLowerCase()

  return async (c, next) => {
    const existing = c.get("requestId")
    const fromHeader = c.req.header(header)

    const requestId = isNonEmptyString(existing)
      ? existing
      : isNonEmptyString(fromHeader)
        ? fromHeader
        : config.generate()

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, header, requestId)
  }
}
