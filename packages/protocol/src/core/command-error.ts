import { BaseError } from "@kvrest/errors"

/**
 * An error reply of a command.
 *
 * `pipelineIndex` is the position of the failed command in the transmitted batch,
 * `-1` when the failure belongs to the whole request.
 */
export class CommandError extends BaseError<"command_error"> {
  /** First word of the message (e.g. "ERR", "WRONGTYPE"), "" when there is none. */
  readonly kind: string
  readonly pipelineIndex: number

  constructor(message: string, pipelineIndex: number) {
    const kind = errorKind(message)

    super(message, {
      code: "command_error",
      context: { kind, pipelineIndex },
    })

    this.kind = kind
    this.pipelineIndex = pipelineIndex
  }
}

export function errorKind(message: string): string {
  const space = message.indexOf(" ")

  return space === -1 ? "" : message.slice(0, space)
}

export function isCommandError(err: unknown): err is CommandError {
  return err instanceof CommandError
}
