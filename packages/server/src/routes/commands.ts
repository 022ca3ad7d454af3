import type { Logger } from "@kvrest/logger"
import type { ConnectionFactory } from "../ports/connection"
import { createDispatcher, type Dispatcher } from "../core/dispatcher"
import type { TokenStore } from "../core/token-store"
import type { Application } from "../server/server"
import type { ReadinessCheck } from "../server/server-options"

export type CommandRoutesDeps = {
  apiToken: string
  getConnection: ConnectionFactory
  tokenStore: TokenStore
  logger: Logger
}

/**
 * Mounts the REST command surface on every path not taken by an earlier route.
 */
export function registerCommandRoutes(app: Application, deps: CommandRoutesDeps): Dispatcher {
  const dispatch = createDispatcher(deps)

  app.all("*", async (c) => {
    const res = await dispatch({
      method: c.req.method,
      url: c.req.url,
      authorization: c.req.header("authorization"),
      signal: c.req.raw.signal,
      logger: c.get("logger"),
      readBody: () => c.req.text(),
    })

    if (res.body === undefined) return c.body(null, res.status)

    return c.json(res.body, res.status)
  })

  return dispatch
}

/**
 * Readiness check that round-trips a `PING` through a fresh backing connection.
 */
export function backingStoreCheck(getConnection: ConnectionFactory): ReadinessCheck {
  return {
    name: "backing-store",
    fn: async (signal) => {
      const conn = await getConnection({ signal })

      try {
        return (await conn.do("PING")) === "PONG"
      } finally {
        await conn.close()
      }
    },
  }
}
