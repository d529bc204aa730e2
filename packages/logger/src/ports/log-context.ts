export type LogContext = {
  service: string
  module: string
  env: string

  messageId: string
  provider: string

  recipients: string[]
  failedRecipients: string[]
  accepted: number

  signed: boolean
  encrypted: boolean
  copies: number

  durationMs: number
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
