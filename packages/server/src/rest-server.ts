import type { Logger } from "@kvrest/logger"
import { TokenStore } from "./core/token-store"
import type { LifecycleHook } from "./lifecycle/lifecycle-hook"
import type { ConnectionFactory } from "./ports/connection"
import { backingStoreCheck, registerCommandRoutes } from "./routes/commands"
import { createServer, type Server } from "./server/server"
import type { ServerOptions } from "./server/server-options"

export type RestServerDeps = {
  logger: Logger
  getConnection: ConnectionFactory
  now?: () => number
}

export type RestServerOptions = Pick<
  ServerOptions,
  "port" | "host" | "shutdownTimeoutMs" | "requestLogging" | "startHooks"
> & {
  apiToken: string

  /** @default a new, empty store owned by this server */
  tokenStore?: TokenStore

  stopHooks?: LifecycleHook[]
}

export type RestServer = {
  server: Server
  tokenStore: TokenStore
}

/**
 * Wires the REST command surface, health endpoints and token store into a server.
 * Issued tokens are dropped when the server stops.
 */
export function createRestServer(deps: RestServerDeps, options: RestServerOptions): RestServer {
  const { apiToken, tokenStore = new TokenStore(), stopHooks = [], ...serverOptions } = options

  const logger = deps.logger.child({ service: "kvrest" })

  const server = createServer(
    { logger, ...(deps.now && { now: deps.now }) },
    {
      ...serverOptions,
      health: { enabled: true, readinessChecks: [backingStoreCheck(deps.getConnection)] },
      routes: (app) => {
        registerCommandRoutes(app, {
          apiToken,
          getConnection: deps.getConnection,
          tokenStore,
          logger: logger.child({ module: "dispatcher" }),
        })
      },
      stopHooks: [
        ...stopHooks,
        {
          name: "token-store.clear",
          fn: async () => tokenStore.clear(),
        },
      ],
    },
  )

  return { server, tokenStore }
}
