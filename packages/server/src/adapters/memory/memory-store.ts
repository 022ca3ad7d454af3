import { randomBytes } from "node:crypto"
import { BaseError } from "@kvrest/errors"

/**
 * Error reply of the in-memory store. The message is Redis' own error text.
 */
export class StoreReplyError extends BaseError<"store_reply"> {
  constructor(message: string) {
    super(message, { code: "store_reply" })
  }
}

export type MemoryStoreOptions = {
  /**
   * ACL users and their passwords. The `default` user accepts any password unless it
   * is listed here.
   */
  users?: Readonly<Record<string, string>>

  /** @default Date.now */
  now?: () => number
}

/** Per-connection state. */
export type Session = {
  user: string
}

type StringEntry = { type: "string"; value: string; expiresAt?: number }
type HashEntry = { type: "hash"; value: Map<string, string>; expiresAt?: number }
type Entry = StringEntry | HashEntry

type CommandSpec = {
  /** Argument count bounds, command name excluded. */
  arity: { min: number; max: number }
  run: (store: MemoryStore, session: Session, args: string[]) => unknown
}

const ANY = Number.POSITIVE_INFINITY

const OK = "OK"

const Errors = {
  wrongType: "WRONGTYPE Operation against a key holding the wrong kind of value",
  wrongPass: "WRONGPASS invalid username-password pair or user is disabled.",
  syntax: "ERR syntax error",
  notInteger: "ERR value is not an integer or out of range",
  invalidExpire: (cmd: string) => `ERR invalid expire time in '${cmd}' command`,
  arity: (cmd: string) => `ERR wrong number of arguments for '${cmd}' command`,
  unknown: (cmd: string, args: string[]) =>
    `ERR unknown command '${cmd}', with args beginning with: ${args.map((a) => `'${a}' `).join("")}`,
  unknownSubcommand: (sub: string, cmd: string) =>
    `ERR unknown subcommand '${sub}'. Try ${cmd} HELP.`,
  genpassBits:
    "ERR ACL GENPASS argument must be the number of bits for the output password, a positive number up to 4096",
  noDefaultPassword:
    "ERR AUTH <password> called without any password configured for the default user. Are you sure your configuration is correct?",
} as const

const commandTable: Readonly<Record<string, CommandSpec>> = {
  ping: {
    arity: { min: 0, max: 1 },
    run: (_s, _session, [message]) => message ?? "PONG",
  },
  echo: {
    arity: { min: 1, max: 1 },
    run: (_s, _session, [message]) => message,
  },
  auth: {
    arity: { min: 1, max: 2 },
    run: (s, session, args) => s.auth(session, args),
  },
  acl: {
    arity: { min: 1, max: ANY },
    run: (s, session, args) => s.acl(session, args),
  },
  get: {
    arity: { min: 1, max: 1 },
    run: (s, _session, [key = ""]) => s.readString(key) ?? null,
  },
  set: {
    arity: { min: 2, max: ANY },
    run: (s, _session, args) => s.set(args),
  },
  mget: {
    arity: { min: 1, max: ANY },
    run: (s, _session, keys) => keys.map((k) => s.readStringOrNull(k)),
  },
  del: {
    arity: { min: 1, max: ANY },
    run: (s, _session, keys) => keys.filter((k) => s.delete(k)).length,
  },
  exists: {
    arity: { min: 1, max: ANY },
    run: (s, _session, keys) => keys.filter((k) => s.lookup(k) !== undefined).length,
  },
  incr: {
    arity: { min: 1, max: 1 },
    run: (s, _session, [key = ""]) => s.incrBy(key, 1),
  },
  incrby: {
    arity: { min: 2, max: 2 },
    run: (s, _session, [key = "", by = ""]) => s.incrBy(key, toInteger(by)),
  },
  decr: {
    arity: { min: 1, max: 1 },
    run: (s, _session, [key = ""]) => s.incrBy(key, -1),
  },
  decrby: {
    arity: { min: 2, max: 2 },
    run: (s, _session, [key = "", by = ""]) => s.incrBy(key, -toInteger(by)),
  },
  expire: {
    arity: { min: 2, max: 2 },
    run: (s, _session, [key = "", seconds = ""]) => s.expire(key, toInteger(seconds) * 1000),
  },
  ttl: {
    arity: { min: 1, max: 1 },
    run: (s, _session, [key = ""]) => s.ttl(key, 1000),
  },
  pttl: {
    arity: { min: 1, max: 1 },
    run: (s, _session, [key = ""]) => s.ttl(key, 1),
  },
  hset: {
    arity: { min: 3, max: ANY },
    run: (s, _session, args) => s.hset("hset", args),
  },
  hget: {
    arity: { min: 2, max: 2 },
    run: (s, _session, [key = "", field = ""]) => s.readHash(key)?.get(field) ?? null,
  },
  hdel: {
    arity: { min: 2, max: ANY },
    run: (s, _session, [key = "", ...fields]) => s.hdel(key, fields),
  },
  hgetall: {
    arity: { min: 1, max: 1 },
    run: (s, _session, [key = ""]) => [...(s.readHash(key) ?? new Map<string, string>())].flat(),
  },
  flushall: {
    arity: { min: 0, max: 1 },
    run: (s) => {
      s.flush()
      return OK
    },
  },
}

const commands: ReadonlyMap<string, CommandSpec> = new Map(Object.entries(commandTable))

/**
 * A small in-process stand-in for Redis: strings, hashes, expirations and the ACL
 * commands the REST server relies on. Replies use Redis' RESP2 shapes and error
 * texts.
 */
export class MemoryStore {
  private readonly entries = new Map<string, Entry>()
  private readonly users: Readonly<Record<string, string>>
  private readonly now: () => number

  constructor(options: MemoryStoreOptions = {}) {
    this.users = options.users ?? {}
    this.now = options.now ?? Date.now
  }

  /**
   * Runs one command. Throws {@link StoreReplyError} for error replies.
   */
  execute(session: Session, command: string, args: readonly string[]): unknown {
    const name = command.toLowerCase()
    const spec = commands.get(name)

    if (!spec) {
      throw new StoreReplyError(Errors.unknown(command, [...args]))
    }

    if (args.length < spec.arity.min || args.length > spec.arity.max) {
      throw new StoreReplyError(Errors.arity(name))
    }

    return spec.run(this, session, [...args])
  }

  auth(session: Session, args: string[]): string {
    const [first = "", second] = args
    const user = second === undefined ? "default" : first
    const password = second ?? first

    if (second === undefined && !Object.hasOwn(this.users, "default")) {
      throw new StoreReplyError(Errors.noDefaultPassword)
    }

    const expected = Object.hasOwn(this.users, user) ? this.users[user] : undefined
    const accepted = expected === undefined ? user === "default" : expected === password

    if (!accepted) throw new StoreReplyError(Errors.wrongPass)

    session.user = user

    return OK
  }

  acl(session: Session, [sub = "", ...rest]: string[]): unknown {
    switch (sub.toLowerCase()) {
      case "genpass": {
        const bits = rest[0] === undefined ? 256 : toInteger(rest[0])

        if (bits <= 0 || bits > 4096) {
          throw new StoreReplyError(Errors.genpassBits)
        }

        return randomBytes(Math.ceil(bits / 8)).toString("hex").slice(0, Math.ceil(bits / 4))
      }
      case "whoami":
        return session.user
      default:
        throw new StoreReplyError(Errors.unknownSubcommand(sub, "ACL"))
    }
  }

  set(args: string[]): string | null {
    const [key = "", value = "", ...options] = args

    let ttlMs: number | undefined
    let condition: "nx" | "xx" | undefined

    for (let i = 0; i < options.length; i++) {
      const option = options[i]?.toLowerCase()

      if (option === "nx" || option === "xx") {
        if (condition) throw new StoreReplyError(Errors.syntax)
        condition = option
        continue
      }

      if ((option === "ex" || option === "px") && ttlMs === undefined) {
        const raw = options[++i]
        if (raw === undefined) throw new StoreReplyError(Errors.syntax)

        const amount = toInteger(raw)
        if (amount <= 0) throw new StoreReplyError(Errors.invalidExpire("set"))

        ttlMs = option === "ex" ? amount * 1000 : amount
        continue
      }

      throw new StoreReplyError(Errors.syntax)
    }

    const exists = this.lookup(key) !== undefined

    if ((condition === "nx" && exists) || (condition === "xx" && !exists)) {
      return null
    }

    this.entries.set(key, {
      type: "string",
      value,
      ...(ttlMs !== undefined && { expiresAt: this.now() + ttlMs }),
    })

    return OK
  }

  incrBy(key: string, by: number): number {
    const current = this.readString(key)
    const next = (current === undefined ? 0 : toInteger(current)) + by

    if (!Number.isSafeInteger(next)) throw new StoreReplyError(Errors.notInteger)

    const expiresAt = this.lookup(key)?.expiresAt

    this.entries.set(key, {
      type: "string",
      value: String(next),
      ...(expiresAt !== undefined && { expiresAt }),
    })

    return next
  }

  hset(name: string, [key = "", ...pairs]: string[]): number {
    if (pairs.length % 2 !== 0) throw new StoreReplyError(Errors.arity(name))

    const existing = this.readHash(key)
    const hash = existing ?? new Map<string, string>()

    let added = 0

    for (let i = 0; i < pairs.length; i += 2) {
      const field = pairs[i] ?? ""

      if (!hash.has(field)) added++
      hash.set(field, pairs[i + 1] ?? "")
    }

    if (!existing) this.entries.set(key, { type: "hash", value: hash })

    return added
  }

  hdel(key: string, fields: string[]): number {
    const hash = this.readHash(key)
    if (!hash) return 0

    const removed = fields.filter((f) => hash.delete(f)).length

    if (hash.size === 0) this.entries.delete(key)

    return removed
  }

  expire(key: string, ms: number): number {
    const entry = this.lookup(key)
    if (!entry) return 0

    if (ms <= 0) {
      this.entries.delete(key)
      return 1
    }

    entry.expiresAt = this.now() + ms

    return 1
  }

  /** -2 when the key is missing, -1 when it has no expiration. */
  ttl(key: string, unitMs: number): number {
    const entry = this.lookup(key)

    if (!entry) return -2
    if (entry.expiresAt === undefined) return -1

    return Math.round((entry.expiresAt - this.now()) / unitMs)
  }

  delete(key: string): boolean {
    return this.lookup(key) !== undefined && this.entries.delete(key)
  }

  flush(): void {
    this.entries.clear()
  }

  lookup(key: string): Entry | undefined {
    const entry = this.entries.get(key)

    if (entry?.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      return undefined
    }

    return entry
  }

  readString(key: string): string | undefined {
    const entry = this.lookup(key)

    if (!entry) return undefined
    if (entry.type !== "string") throw new StoreReplyError(Errors.wrongType)

    return entry.value
  }

  /** MGET semantics: a key of another type reads as null instead of failing. */
  readStringOrNull(key: string): string | null {
    const entry = this.lookup(key)

    return entry?.type === "string" ? entry.value : null
  }

  readHash(key: string): Map<string, string> | undefined {
    const entry = this.lookup(key)

    if (!entry) return undefined
    if (entry.type !== "hash") throw new StoreReplyError(Errors.wrongType)

    return entry.value
  }
}

function toInteger(raw: string): number {
  if (!/^-?\d+$/.test(raw)) throw new StoreReplyError(Errors.notInteger)

  const value = Number(raw)

  if (!Number.isSafeInteger(value)) throw new StoreReplyError(Errors.notInteger)

  return value
}
