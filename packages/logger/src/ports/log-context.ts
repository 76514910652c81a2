/** Fields a logger can carry on every line it writes. */
export type LogContext = {
  service: string
  /** Name of the operation being retried, e.g. `"fetch-invoice"` */
  operation: string
  requestId: string
}

/** Per-call fields. `err` is serialized with its cause chain. */
export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> & {
  err?: unknown
  attemptNr?: number
  delayMs?: number
} & Record<string, unknown>

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
