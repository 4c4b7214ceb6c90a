export type LogContext = {
  /** Structure emitting the entry, e.g. "Vector" or "OrderedMap". */
  collection: string
  operation: string

  size: number
  capacity: number

  module: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
