/** `{ "result": ... }`: the value is opaque until decoded into a destination. */
export type SuccessReply = { result: unknown }

/** `{ "error": "..." }`: raw backing-store (or protocol) error text. */
export type ErrorReply = { error: string }

export type Reply = SuccessReply | ErrorReply

/**
 * Replies of a pipeline, positionally aligned with the commands that produced them.
 */
export type ReplyBatch = Reply[]
