/**
 * Well-known fields attached to codec log entries.
 *
 * Raw field values and encoded identifiers are never logged; entries carry the
 * cookie, the field being processed and lengths only.
 */
export type LogContext = {
  service: string
  module: string

  cookie: string
  field: string
  type: string

  length: number
  maxLength: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
