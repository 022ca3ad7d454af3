import type { Logger } from "@kvrest/logger"
import type { Middleware } from "../server/server"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"

/**
 * Logs each completed request: 5xx at `error`, everything else at the configured level.
 * Query strings are left out since they may carry `_token`.
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const method = c.req.method

      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method,
        path,
        op: `${method} ${path}`,
        status,
        durationMs: Math.round(performance.now() - start),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) {
        logger.error("Request completed", meta)
      } else {
        logger[config.level]("Request completed", meta)
      }
    }
  }
}

function shouldIgnore(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
