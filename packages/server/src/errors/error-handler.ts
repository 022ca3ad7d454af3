import { toAppError } from "@kvrest/errors"
import type { Logger } from "@kvrest/logger"
import { failure, Messages } from "@kvrest/protocol"
import type { ErrorHandler as HonoErrorHandler } from "hono"

export type ErrorHandler = HonoErrorHandler

/**
 * Last-resort handler for exceptions escaping a route, e.g. a connection factory that
 * cannot reach the backing store. Always answers 500 with the REST error envelope;
 * details go to the log only.
 */
export function createErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    const appError = toAppError(err)

    const method = c.req.method
    const path = c.req.path
    const log = c.get("logger") ?? logger

    log.error("Request failed", {
      requestId: c.get("requestId") ?? "unknown",
      method,
      path,
      op: `${method} ${path}`,
      status: 500,
      code: appError.code,
      operational: appError.isOperational,
      err: appError,
    })

    return c.json(failure(Messages.internal), 500)
  }
}

export type CreateErrorHandlerFn = typeof createErrorHandler
