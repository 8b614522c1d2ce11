export type LogContext = {
  service: string
  env: string

  /** Component emitting the entry, e.g. "state-container" or "progressive-loader". */
  module: string

  /** Screen namespace the entry belongs to, e.g. "dashboard" or "chat". */
  screen: string

  operation: string
  key: string
  tier: string
}

export type LogOutcome = {
  outcome: string
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
