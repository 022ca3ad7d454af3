/**
 * Token form of a command argument on the wire. Numbers stay numbers so the JSON
 * body keeps them unquoted.
 */
export type WireArg = string | number

/**
 * A value that knows its own argument representation.
 *
 * `toArg()` should return a string or a byte array. Its result is encoded once:
 * returning another `Argument` does not recurse, that value is stringified.
 */
export interface Argument {
  toArg(): unknown
}

/**
 * A command ready for transmission: name first, then encoded arguments.
 */
export type Command = readonly [name: string, ...args: WireArg[]]
