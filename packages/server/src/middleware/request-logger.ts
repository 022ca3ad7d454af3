import type { Logger } from "@kvrest/logger"
import type { Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/**
 * Binds a child logger carrying the request ID to the context.
 */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    if (!c.get("logger")) {
      const requestId = c.get("requestId")

      c.set("logger", baseLogger.child(isNonEmptyString(requestId) ? { requestId } : {}))
    }

    await next()
  }
}
