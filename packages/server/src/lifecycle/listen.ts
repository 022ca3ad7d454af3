import type { AddressInfo } from "node:net"
import { serve } from "@hono/node-server"
import type { Logger } from "@kvrest/logger"
import type { Application } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

export type ListeningServer = {
  server: Closeable
  /** Bound address; differs from the options when port 0 was requested. */
  address: { host: string; port: number }
}

/**
 * Starts the HTTP listener and resolves once it is bound.
 */
export function listen(
  app: Application,
  options: ResolvedServerOptions,
  logger: Logger,
): Promise<ListeningServer> {
  return new Promise((resolve, reject) => {
    const server = serve(
      { fetch: app.fetch, port: options.port, hostname: options.host },
      (info: AddressInfo) => {
        server.off("error", reject)

        const address = { host: options.host, port: info.port }

        logger.info(`Server listening on http://${address.host}:${address.port}`)

        resolve({ server, address })
      },
    )

    server.once("error", reject)
  })
}

export type ListenFn = typeof listen
