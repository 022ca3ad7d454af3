import {
  type Command,
  CommandError,
  encodeArg,
  isErrorReply,
  type ReplyBatch,
} from "@kvrest/protocol"
import { RequestError } from "./errors"
import type { Slot } from "./slot"
import { type TransportConfig, transmit } from "./transport"

/** A reply's destination; `null` ignores the reply. */
export type Destination = Slot<unknown> | null

/**
 * Queues commands and executes them in one round trip: a single command as a plain
 * call, several as a pipeline. Each execution consumes the queue.
 *
 * Not safe for concurrent use: start one request per unit of work with
 * {@link Client.newRequest}.
 */
export class Request {
  private queue: Command[] = []

  constructor(
    private readonly transport: TransportConfig,
    private readonly token: string,
  ) {}

  /** Number of queued commands. */
  get pending(): number {
    return this.queue.length
  }

  /**
   * Queues a command. Arguments are encoded right away; nothing is sent.
   *
   * @throws RequestError `empty_command` when `command` is empty
   */
  send(command: string, ...args: unknown[]): this {
    if (command === "") throw new RequestError("empty_command")

    this.queue.push([command, ...args.map(encodeArg)])

    return this
  }

  /**
   * Executes the queue and decodes replies into `destinations` by position.
   *
   * Extra replies are discarded. When some commands failed, the remaining results are
   * still decoded and the lowest-index {@link CommandError} is thrown.
   */
  async exec(...destinations: Destination[]): Promise<void> {
    const replies = await this.drain()

    if (destinations.length > replies.length) {
      throw new RequestError("too_many_destinations")
    }

    let firstError: CommandError | undefined

    for (const [i, destination] of destinations.entries()) {
      const reply = replies[i]

      if (!reply) continue

      if (isErrorReply(reply)) {
        firstError ??= new CommandError(reply.error, i)
        continue
      }

      if (destination && reply.result !== null) destination.decode(reply.result, i)
    }

    if (firstError) throw firstError
  }

  /**
   * Queues `command` last, executes everything and reports only that command: its
   * error as a {@link CommandError} at index 0, or its result decoded into
   * `destination`.
   *
   * @returns the decoded value, `undefined` for a null result or a null destination
   */
  async execOne<T>(
    destination: Slot<T> | null,
    command: string,
    ...args: unknown[]
  ): Promise<T | undefined> {
    this.send(command, ...args)

    const replies = await this.drain()
    const last = replies.at(-1)

    if (!last) throw new RequestError("no_command")
    if (isErrorReply(last)) throw new CommandError(last.error, 0)

    if (!destination || last.result === null) return undefined

    destination.decode(last.result, 0)

    return destination.value
  }

  /**
   * Executes the queue and returns every reply as received. Rejects only when the
   * request itself failed.
   */
  execRaw(): Promise<ReplyBatch> {
    return this.drain()
  }

  private async drain(): Promise<ReplyBatch> {
    if (this.queue.length === 0) throw new RequestError("no_command")

    const batch = this.queue
    this.queue = []

    return transmit(this.transport, this.token, batch)
  }
}
