import type { Logger } from "@kvrest/logger"
import type { WireArg } from "@kvrest/protocol"
import type { Connection, ConnectionFactory } from "../../ports/connection"
import { createRedisCommandClient, type RedisCommandClient } from "./redis-client"

/**
 * One Redis client per connection, so per-connection state such as `AUTH` never leaks
 * between requests. Error replies reject with Redis' error text as the message.
 */
export class RedisConnection implements Connection {
  constructor(private readonly client: RedisCommandClient) {}

  do(command: string, ...args: WireArg[]): Promise<unknown> {
    return this.client.sendCommand([command, ...args.map(String)])
  }

  async close(): Promise<void> {
    if (this.client.isOpen) await this.client.quit()
  }
}

export type RedisConnectionFactoryOptions = {
  url: string
  logger: Logger

  /** @default createRedisCommandClient */
  createClient?: (url: string) => RedisCommandClient
}

export function createRedisConnectionFactory(
  options: RedisConnectionFactoryOptions,
): ConnectionFactory {
  const create = options.createClient ?? createRedisCommandClient
  const logger = options.logger.child({ module: "redis" })

  return async ({ signal }) => {
    signal?.throwIfAborted()

    const client = create(options.url)

    client.on("error", (err) => logger.error("Redis client error", { err }))

    try {
      await untilAborted(client.connect(), signal)
    } catch (err) {
      if (client.isOpen) client.destroy()
      throw err
    }

    return new RedisConnection(client)
  }
}

function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)

    signal.addEventListener("abort", onAbort, { once: true })

    void promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort))
  })
}
