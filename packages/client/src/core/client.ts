import { createNullLogger, type Logger } from "@kvrest/logger"
import type { FetchFn } from "../ports/fetch"
import { Request } from "./request"
import type { Slot } from "./slot"
import type { TransportConfig } from "./transport"

export type ClientOptions = {
  /** REST endpoint, e.g. `https://kv.example.com`. */
  baseUrl: string

  apiToken: string

  /** @default globalThis.fetch */
  fetch?: FetchFn

  /** Sent with every request. An `Authorization` header here replaces the bearer token. */
  headers?: RequestInit["headers"]

  logger?: Logger
}

/**
 * REST client for a Redis-compatible command endpoint. Holds configuration only, so
 * one instance can serve any number of concurrent requests.
 */
export class Client {
  private readonly transport: TransportConfig
  private readonly apiToken: string

  constructor(options: ClientOptions) {
    this.apiToken = options.apiToken
    this.transport = {
      baseUrl: options.baseUrl,
      fetch: options.fetch ?? ((url, init) => fetch(url, init)),
      headers: new Headers(options.headers),
      logger: (options.logger ?? createNullLogger()).child({ module: "client" }),
    }
  }

  newRequest(): Request {
    return new Request(this.transport, this.apiToken)
  }

  /**
   * A request authenticated by a token issued with `ACL RESTTOKEN` instead of the
   * client's API token.
   */
  newRequestWithToken(token: string): Request {
    return new Request(this.transport, token)
  }

  /** Runs one command on a fresh request. */
  execOne<T>(destination: Slot<T> | null, command: string, ...args: unknown[]): Promise<T | undefined> {
    return this.newRequest().execOne(destination, command, ...args)
  }
}
