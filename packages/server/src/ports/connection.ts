import type { WireArg } from "@kvrest/protocol"

/**
 * A backing-store connection, used by one request at a time.
 *
 * `do` resolves with the raw reply and rejects with the store's error text as the
 * error message.
 */
export interface Connection {
  do(command: string, ...args: WireArg[]): Promise<unknown>
  close(): Promise<void>
}

export type ConnectionContext = {
  /** Aborted when the inbound request goes away. */
  signal?: AbortSignal
}

/**
 * Yields a fresh connection per request. Pooling, if any, is the factory's business.
 */
export type ConnectionFactory = (ctx: ConnectionContext) => Promise<Connection>
