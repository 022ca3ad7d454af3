export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (command names, statuses, positions).
 * Never put credentials or tokens here: context ends up in logs.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (true) or a programmer error /
   * invariant violation (false).
   *
   * @remarks
   * - Operational: a command rejected by the backing store, a malformed request body,
   *   a network failure.
   * - Non-operational: a reply that violates the wire contract, a bug.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
