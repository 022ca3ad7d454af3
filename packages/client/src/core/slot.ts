import { z } from "zod"
import { DecodeError } from "./errors"

/**
 * A typed destination for one reply. `value` stays `undefined` until a non-null
 * result has been decoded into it.
 *
 * @example
 * ```ts
 * const count = slot(z.number())
 * await req.send("INCR", "visits").exec(count)
 * count.value // 1
 * ```
 */
export class Slot<T> {
  value: T | undefined

  constructor(readonly schema: z.ZodType<T>) {}

  /**
   * @param index - position of the reply, reported on failure
   * @throws DecodeError when `raw` does not match the schema
   */
  decode(raw: unknown, index: number): void {
    const parsed = this.schema.safeParse(raw)

    if (!parsed.success) {
      throw new DecodeError(
        `cannot decode result ${index}: ${z.prettifyError(parsed.error)}`,
        index,
        parsed.error,
      )
    }

    this.value = parsed.data
  }
}

export function slot<T>(schema: z.ZodType<T>): Slot<T> {
  return new Slot(schema)
}
