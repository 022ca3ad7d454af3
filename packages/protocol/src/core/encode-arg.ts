import type { Argument, WireArg } from "../ports/argument"

const utf8 = new TextDecoder()

export function isArgument(value: unknown): value is Argument {
  return (
    typeof value === "object" &&
    value !== null &&
    "toArg" in value &&
    typeof value.toArg === "function"
  )
}

/**
 * Encodes any value into a wire token.
 *
 * - strings as-is, byte arrays as their UTF-8 text
 * - finite numbers unchanged, bigints as decimal text
 * - booleans as "1" / "0", null and undefined as ""
 * - {@link Argument}s through `toArg()`, one level deep
 * - anything else through {@link argToText}; unsupported values never throw
 */
export function encodeArg(value: unknown): WireArg {
  return encode(value, true)
}

function encode(value: unknown, allowArgument: boolean): WireArg {
  switch (typeof value) {
    case "string":
      return value
    case "number":
      return Number.isFinite(value) ? value : String(value)
    case "bigint":
      return value.toString()
    case "boolean":
      return value ? "1" : "0"
    case "undefined":
      return ""
  }

  if (value === null) return ""
  if (value instanceof Uint8Array) return utf8.decode(value)

  if (allowArgument && isArgument(value)) {
    return encode(value.toArg(), false)
  }

  return argToText(value)
}

/**
 * Human-readable text of any value, used where only text is accepted (command
 * names, fallback argument encoding).
 */
export function argToText(value: unknown): string {
  if (typeof value === "string") return value
  if (value === null || value === undefined) return ""
  if (value instanceof Uint8Array) return utf8.decode(value)

  if (typeof value === "object" && hasOwnToString(value)) {
    return String(value)
  }

  if (typeof value === "object") {
    try {
      return JSON.stringify(value) ?? String(value)
    } catch {
      // cycles and bigints inside objects
      return String(value)
    }
  }

  return String(value)
}

function hasOwnToString(value: object): boolean {
  return !Array.isArray(value) && value.toString !== Object.prototype.toString
}
