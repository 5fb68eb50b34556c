/**
 * Well-known fields a log entry may be bound to.
 *
 * Cache components bind `module` once and add `key`, `category` or
 * `pattern` per entry.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  namespace: string
  category: string
  key: string
  pattern: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a logger's bindings by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
