export type LogContext = {
  service: string
  module: string
  env: string

  /** Record field being bound */
  field: string
  /** Source kind that produced a value: "file", "env", "flag", "default" */
  source: string
  /** Lookup key within that source (file path, variable name, flag name) */
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
