import type { LogLevelName } from "./log-level"

/**
 * Logging policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; e.g. "info" drops "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off in production, where
   * JSON lines are what log processors ingest.
   */
  prettify?: boolean
}
