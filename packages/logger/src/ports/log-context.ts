export type LogContext = {
  requestId: string
  method: string
  path: string

  status: number
  durationMs: number

  service: string
  component: string
  subcommand: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields added to (or overriding) a logger's bound context by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
