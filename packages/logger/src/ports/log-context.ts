export type LogContext = {
  service: string
  module: string
  env: string

  /** Full container key a collection adapter is bound to. */
  key: string
  /** Store command being issued, e.g. `hSet` or `zRangeWithScores`. */
  command: string
}

export type LogOutcome = {
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
