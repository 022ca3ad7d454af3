import { z } from "zod"
import type { ErrorReply, Reply, SuccessReply } from "../ports/reply"

export function success(result: unknown): SuccessReply {
  return { result: result ?? null }
}

export function failure(error: string): ErrorReply {
  return { error }
}

export function isErrorReply(reply: Reply): reply is ErrorReply {
  return "error" in reply && typeof reply.error === "string" && reply.error !== ""
}

/**
 * Wire shape of one reply as received. An empty `error` counts as no error, a
 * missing `result` as null.
 */
const replySchema = z
  .object({
    error: z.string().optional(),
    result: z.unknown().optional(),
  })
  .transform((raw): Reply => (raw.error ? failure(raw.error) : success(raw.result)))

export const singleReplySchema = replySchema

export const pipelineReplySchema = z.array(replySchema)

/**
 * `{ "error": "..." }` bodies of non-200 responses.
 */
export const errorEnvelopeSchema = z.object({ error: z.string().min(1) })
