import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance: which levels are emitted and how they render.
 *
 * Adapters must honor these options but choose how internally.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print for humans. Meant for local development; production
   * should keep structured JSON lines.
   */
  prettify?: boolean
}
