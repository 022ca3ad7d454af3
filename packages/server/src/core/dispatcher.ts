import { createHash, timingSafeEqual } from "node:crypto"
import { errorMessage } from "@kvrest/errors"
import type { Logger } from "@kvrest/logger"
import { argToText, failure, Messages, type Reply, success, type WireArg } from "@kvrest/protocol"
import type { Connection, ConnectionFactory } from "../ports/connection"
import {
  type ParsedCommand,
  parseCommandBody,
  parsePathCommand,
  parsePipelineBody,
  trimTrailingSlash,
} from "./command-parser"
import type { Credential, TokenStore } from "./token-store"

export type DispatchStatus = 200 | 400 | 401 | 405 | 500

export type DispatchRequest = {
  method: string

  /** Absolute request URL. */
  url: string

  /** Raw `Authorization` header. */
  authorization?: string | undefined

  signal?: AbortSignal

  /** Per-request logger; falls back to the dispatcher's. */
  logger?: Logger

  readBody(): Promise<string>
}

/**
 * `body` is the JSON payload; `undefined` means an empty response body.
 */
export type DispatchResponse = {
  status: DispatchStatus
  body?: Reply | Reply[]
}

export type Dispatcher = (req: DispatchRequest) => Promise<DispatchResponse>

export type DispatcherDeps = {
  /** Admin token. Must be non-empty. */
  apiToken: string
  getConnection: ConnectionFactory
  tokenStore: TokenStore
  logger: Logger
}

type Identity = { kind: "admin" } | { kind: "token"; credential: Credential }

/** Result of one command: always a single envelope. */
type Outcome = { status: 200 | 400; body: Reply }

const ALLOWED_METHODS: ReadonlySet<string> = new Set(["GET", "POST"])

/**
 * Builds the transport-neutral REST handler: authenticates, parses the command from
 * the path, body or query string, runs it on a fresh backing connection and wraps
 * the reply in the `{ result }` / `{ error }` envelope.
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const adminDigest = digest(deps.apiToken)

  function authenticate(token: string): Identity | undefined {
    if (token === "") return undefined
    if (timingSafeEqual(digest(token), adminDigest)) return { kind: "admin" }

    const credential = deps.tokenStore.lookup(token)

    return credential ? { kind: "token", credential } : undefined
  }

  async function execute(
    conn: Connection,
    log: Logger,
    name: string,
    args: WireArg[],
  ): Promise<Outcome> {
    if (isRestTokenCommand(name, args)) {
      return issueToken(conn, log, args)
    }

    log.debug("Executing command", { command: name })

    try {
      const result = await conn.do(name, ...args)

      return { status: 200, body: success(result) }
    } catch (err) {
      return { status: 400, body: failure(errorMessage(err)) }
    }
  }

  async function issueToken(
    conn: Connection,
    log: Logger,
    args: WireArg[],
  ): Promise<Outcome> {
    // RESTTOKEN <username> <password>
    if (args.length !== 3) {
      return { status: 400, body: failure(Messages.restTokenSyntax) }
    }

    const username = argToText(args[1])
    const password = argToText(args[2])

    const auth = await execute(conn, log, "AUTH", [username, password])
    if (auth.status !== 200) return auth

    let token: unknown

    try {
      token = await conn.do("ACL", "GENPASS")
    } catch (err) {
      return { status: 400, body: failure(errorMessage(err)) }
    }

    if (typeof token !== "string" || token === "") {
      return { status: 400, body: failure(Messages.genpassReply) }
    }

    deps.tokenStore.store(token, { username, password })
    log.info("Issued REST token", { username })

    return { status: 200, body: success(token) }
  }

  async function route(
    conn: Connection,
    log: Logger,
    url: URL,
    body: string,
  ): Promise<DispatchResponse> {
    const path = trimTrailingSlash(url.pathname)

    if (path === "") {
      const parsed = parseCommandBody(body)
      if (!parsed.ok) return { status: 400, body: failure(parsed.error) }

      return run(conn, log, parsed.value)
    }

    if (path === "/pipeline") {
      const parsed = parsePipelineBody(body)
      if (!parsed.ok) return { status: 400, body: failure(parsed.error) }

      const replies: Reply[] = []

      for (const command of parsed.value) {
        if (!command) {
          replies.push(failure(Messages.emptyPipelineCommand))
          continue
        }

        const outcome = await run(conn, log, command)
        replies.push(outcome.body)
      }

      return { status: 200, body: replies }
    }

    return run(conn, log, parsePathCommand(path, body, url.search.slice(1)))
  }

  function run(conn: Connection, log: Logger, command: ParsedCommand): Promise<Outcome> {
    return execute(conn, log, command.name, command.args)
  }

  return async (req) => {
    const log = req.logger ?? deps.logger
    const url = new URL(req.url)

    const identity = authenticate(requestToken(url, req.authorization))

    if (!identity) {
      return { status: 401, body: failure(Messages.unauthorized) }
    }

    if (!ALLOWED_METHODS.has(req.method)) {
      return { status: 405 }
    }

    let body: string

    try {
      body = await req.readBody()
    } catch (err) {
      return { status: 500, body: failure(errorMessage(err)) }
    }

    const conn = await deps.getConnection({ signal: req.signal })

    try {
      if (identity.kind === "token") {
        const { username, password } = identity.credential

        const auth = await execute(conn, log, "AUTH", [username, password])
        if (auth.status !== 200) return auth
      }

      return await route(conn, log, url, body)
    } finally {
      await closeConnection(conn, log)
    }
  }
}

/**
 * The `_token` query parameter wins over the `Authorization` header.
 */
export function requestToken(url: URL, authorization: string | undefined): string {
  const fromQuery = url.searchParams.get("_token")
  if (fromQuery) return fromQuery

  const header = authorization ?? ""

  return header.startsWith("Bearer ") ? header.slice("Bearer ".length) : header
}

export function isRestTokenCommand(name: string, args: readonly WireArg[]): boolean {
  return (
    name.toLowerCase() === "acl" &&
    args.length > 0 &&
    argToText(args[0]).toLowerCase() === "resttoken"
  )
}

async function closeConnection(conn: Connection, log: Logger): Promise<void> {
  try {
    await conn.close()
  } catch (err) {
    log.warn("Failed to close backing connection", { err })
  }
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest()
}
