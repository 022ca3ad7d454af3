import { argToText, encodeArg, Messages, type WireArg } from "@kvrest/protocol"
import { z } from "zod"

export type ParsedCommand = {
  name: string
  args: WireArg[]
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string }

/** `undefined` marks an empty inner command. */
export type PipelineEntry = ParsedCommand | undefined

const commandSchema = z.array(z.unknown()).nullable()
const pipelineSchema = z.array(z.array(z.unknown()).nullable()).nullable()

/**
 * Root path: the body is a single JSON array, command name first.
 */
export function parseCommandBody(body: string): ParseResult<ParsedCommand> {
  const parsed = commandSchema.safeParse(parseJson(body))

  if (!parsed.success) return { ok: false, error: Messages.parseCommand }

  const command = fromArray(parsed.data ?? [])

  if (!command) return { ok: false, error: Messages.emptyCommand }

  return { ok: true, value: command }
}

/**
 * `/pipeline`: the body is an array of command arrays.
 */
export function parsePipelineBody(body: string): ParseResult<PipelineEntry[]> {
  const parsed = pipelineSchema.safeParse(parseJson(body))

  if (!parsed.success) return { ok: false, error: Messages.parsePipeline }

  const commands = parsed.data ?? []

  if (commands.length === 0) return { ok: false, error: Messages.emptyPipeline }

  return { ok: true, value: commands.map((raw) => fromArray(raw ?? [])) }
}

/**
 * Any other path: path segments, then the raw body as one argument, then query pairs.
 *
 * @param pathname - request path, trailing slash already removed
 * @param rawQuery - query string without the leading `?`
 */
export function parsePathCommand(
  pathname: string,
  body: string,
  rawQuery: string,
): ParsedCommand {
  const segments = pathname.split("/").slice(1).map(decodePart)

  if (body.length > 0) segments.push(body)

  segments.push(...queryArgs(rawQuery))

  const [name = "", ...args] = segments

  return { name, args }
}

/**
 * `k=v` contributes `k` and `v`, a bare `k` contributes `k`. The `_token` pair carries
 * the credential and never becomes an argument.
 */
export function queryArgs(rawQuery: string): string[] {
  const args: string[] = []

  for (const part of rawQuery.split("&")) {
    if (part === "") continue

    const eq = part.indexOf("=")
    const key = decodePart(eq === -1 ? part : part.slice(0, eq))

    if (key === "_token") continue

    args.push(key)
    if (eq !== -1) args.push(decodePart(part.slice(eq + 1)))
  }

  return args
}

export function trimTrailingSlash(pathname: string): string {
  return pathname.endsWith("/") ? pathname.slice(0, -1) : pathname
}

function fromArray(raw: readonly unknown[]): ParsedCommand | undefined {
  if (raw.length === 0) return undefined

  const [name, ...rest] = raw

  return { name: argToText(name), args: rest.map(encodeArg) }
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    // rejected by the schema
    return undefined
  }
}

function decodePart(part: string): string {
  try {
    return decodeURIComponent(part)
  } catch {
    return part
  }
}
