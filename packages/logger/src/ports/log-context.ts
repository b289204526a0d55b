/**
 * Fields a logger may be scoped with via `child()`.
 */
export type LogContext = {
  service: string
  env: string

  /** Package or subsystem emitting the entry, e.g. "config" */
  module: string

  /** Provenance of the configuration being handled, e.g. "env" or "json:crm.json" */
  source: string

  /** Absolute path of a file being read */
  file: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
