import type { WireArg } from "@kvrest/protocol"
import type { Connection, ConnectionFactory } from "../../ports/connection"
import { MemoryStore, type MemoryStoreOptions, type Session } from "./memory-store"

/**
 * A connection to a {@link MemoryStore}. Keeps its own authenticated user like a
 * Redis connection does.
 */
export class MemoryConnection implements Connection {
  private readonly session: Session = { user: "default" }
  private closed = false

  constructor(private readonly store: MemoryStore) {}

  async do(command: string, ...args: WireArg[]): Promise<unknown> {
    if (this.closed) throw new Error("connection closed")

    return this.store.execute(this.session, command, args.map(String))
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

/**
 * All connections share one store; each gets a fresh session.
 */
export function createMemoryConnectionFactory(
  store: MemoryStore | MemoryStoreOptions = {},
): ConnectionFactory {
  const shared = store instanceof MemoryStore ? store : new MemoryStore(store)

  return async () => new MemoryConnection(shared)
}
