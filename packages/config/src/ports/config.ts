/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ PORT: z.coerce.number().default(8080), API_TOKEN: z.string() }),
 *   sources: [new DotenvSource({ file: ".env", required: false, prefix: "KVREST_" })],
 * })
 *
 * config.get("PORT")      // 8080
 * config.explain("PORT")  // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that provided the final value, or "default". */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined in the schema (typos, stale settings). */
  unknownKeys(): string[]
}
