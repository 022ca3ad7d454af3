import { BaseError } from "@kvrest/errors"

export type RequestErrorCode = "empty_command" | "no_command" | "too_many_destinations"

const requestMessages: Readonly<Record<RequestErrorCode, string>> = {
  empty_command: "empty command",
  no_command: "no command to execute",
  too_many_destinations: "too many destination values",
}

/**
 * Misuse of a {@link Request}, detected without (or after) the round trip.
 */
export class RequestError extends BaseError<RequestErrorCode> {
  constructor(code: RequestErrorCode) {
    super(requestMessages[code], { code })
  }
}

export type TransportErrorOptions = {
  /** HTTP status, when a response arrived. */
  status?: number
  cause?: unknown
}

/**
 * The HTTP exchange failed: network error, non-200 status without an error envelope,
 * or an unreadable 200 body. Only network failures are retryable.
 */
export class TransportError extends BaseError<"transport_error"> {
  readonly status: number | undefined

  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, {
      code: "transport_error",
      context: { status: options.status },
      cause: options.cause,
      isRetryable: options.status === undefined,
    })

    this.status = options.status
  }
}

/**
 * A result did not match its destination's schema.
 */
export class DecodeError extends BaseError<"decode_error"> {
  readonly pipelineIndex: number

  constructor(message: string, pipelineIndex: number, cause: unknown) {
    super(message, { code: "decode_error", context: { pipelineIndex }, cause })

    this.pipelineIndex = pipelineIndex
  }
}
