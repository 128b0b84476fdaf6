export type LogContext = {
  service: string
  module: string
  env: string

  operation: string
  requestId: string
  traceId: string
}

export type LogEvent = {
  /** Rendered through the adapter's error serializer */
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
