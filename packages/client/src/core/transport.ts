import { errorMessage } from "@kvrest/errors"
import type { Logger } from "@kvrest/logger"
import {
  type Command,
  CommandError,
  errorEnvelopeSchema,
  pipelineReplySchema,
  type ReplyBatch,
  singleReplySchema,
} from "@kvrest/protocol"
import type { FetchFn } from "../ports/fetch"
import { TransportError } from "./errors"

/** Bytes of a non-200 body kept for the error message. */
const ERROR_BODY_LIMIT = 512

export type TransportConfig = {
  baseUrl: string
  fetch: FetchFn
  headers: Headers
  logger: Logger
}

/**
 * Sends a batch and returns one reply per command. A single command goes to the base
 * URL as `["CMD", ...]`, several go to `<base>/pipeline` as `[["CMD", ...], ...]`.
 */
export async function transmit(
  config: TransportConfig,
  token: string,
  batch: readonly Command[],
): Promise<ReplyBatch> {
  const pipeline = batch.length > 1
  const url = pipeline ? pipelineUrl(config.baseUrl) : config.baseUrl

  const headers = new Headers(config.headers)
  if (!headers.has("authorization")) headers.set("authorization", `Bearer ${token}`)
  if (!headers.has("content-type")) headers.set("content-type", "application/json")

  config.logger.debug("Sending commands", { commands: batch.length, pipeline })

  let res: Response

  try {
    res = await config.fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(pipeline ? batch : batch[0]),
    })
  } catch (err) {
    throw new TransportError(`request failed: ${errorMessage(err)}`, { cause: err })
  }

  if (res.status !== 200) {
    config.logger.debug("Request rejected", { status: res.status })
    throw await statusError(res)
  }

  const raw = await readJson(res)

  if (pipeline) {
    const parsed = pipelineReplySchema.safeParse(raw)
    if (!parsed.success) throw invalidBody(res.status, parsed.error)

    if (parsed.data.length !== batch.length) {
      throw invalidBody(
        res.status,
        new Error(`expected ${batch.length} replies, got ${parsed.data.length}`),
      )
    }

    return parsed.data
  }

  const parsed = singleReplySchema.safeParse(raw)
  if (!parsed.success) throw invalidBody(res.status, parsed.error)

  return [parsed.data]
}

export function pipelineUrl(baseUrl: string): string {
  const url = new URL(baseUrl)

  url.pathname = `${url.pathname.replace(/\/+$/, "")}/pipeline`

  return url.toString()
}

async function statusError(res: Response): Promise<Error> {
  const body = await readErrorBody(res)

  if (body === "") {
    return new TransportError(`[${res.status}]: ${statusLine(res)}`, { status: res.status })
  }

  const envelope = errorEnvelopeSchema.safeParse(parseJson(body))

  if (envelope.success) return new CommandError(envelope.data.error, -1)

  return new TransportError(`[${res.status}]: ${body}`, { status: res.status })
}

async function readErrorBody(res: Response): Promise<string> {
  if (!res.body) return ""

  const reader = res.body.getReader()
  const chunks: Uint8Array[] = []
  let size = 0

  try {
    while (size < ERROR_BODY_LIMIT) {
      const { done, value } = await reader.read()
      if (done) break

      chunks.push(value)
      size += value.byteLength
    }

    if (size >= ERROR_BODY_LIMIT) await reader.cancel()
  } catch {
    // an unreadable body reports like an empty one
    return ""
  }

  const bytes = new Uint8Array(size)
  let offset = 0

  for (const chunk of chunks) {
    bytes.set(chunk, offset)
    offset += chunk.byteLength
  }

  return new TextDecoder().decode(bytes.subarray(0, ERROR_BODY_LIMIT))
}

async function readJson(res: Response): Promise<unknown> {
  let text: string

  try {
    text = await res.text()
  } catch (err) {
    throw new TransportError(`cannot read response body: ${errorMessage(err)}`, {
      status: res.status,
      cause: err,
    })
  }

  try {
    return JSON.parse(text)
  } catch (err) {
    throw invalidBody(res.status, err)
  }
}

function invalidBody(status: number, cause: unknown): TransportError {
  return new TransportError("invalid response body", { status, cause })
}

function statusLine(res: Response): string {
  return `${res.status} ${res.statusText}`.trim()
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    // not an error envelope
    return undefined
  }
}
