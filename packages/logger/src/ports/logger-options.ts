import type { LogLevelName } from "./log-level"

/**
 * Policy options honored by every Logger adapter.
 */
export type LoggerOptions = {
  /** Minimum level to emit; "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Pretty-print for local development. Keep disabled in production where
   * structured JSON lines are ingested.
   */
  prettify?: boolean
}
