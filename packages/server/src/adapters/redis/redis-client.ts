import { createClient } from "redis"

/**
 * The slice of a `redis` client the REST server uses: raw commands in, raw replies out.
 */
export type RedisCommandClient = {
  isOpen: boolean

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  destroy(): void

  sendCommand(args: readonly string[]): Promise<unknown>

  on(event: "error", listener: (err: unknown) => void): unknown
}

/**
 * Creates a client that gives up on the first failed connect; each request opens its
 * own connection, so there is nothing to reconnect.
 */
export function createRedisCommandClient(url: string): RedisCommandClient {
  return createClient({
    url,
    socket: { reconnectStrategy: false },
  }) as unknown as RedisCommandClient
}
