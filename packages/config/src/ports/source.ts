/**
 * A source of raw configuration values. Loading only: no validation, coercion or
 * merging. Sources are applied in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /** Human-readable name used for provenance, e.g. "env" or "dotenv:.env". */
  readonly name: string

  /** Returning undefined for a key means "not provided". */
  load(): Promise<Record<string, unknown>>
}
