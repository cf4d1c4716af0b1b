/** How a read was answered. */
export type CacheOutcome = "hit" | "leader" | "inflight" | "stale"

export type LogContext = {
  service: string
  module: string
  session: string

  operation: string
  entity: string
  key: string

  method: string
  path: string
  status: number
  durationMs: number

  cache: CacheOutcome
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

export type LogBindings = Partial<LogContext> & Record<string, unknown>
