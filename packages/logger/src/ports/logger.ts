import type { LogContext, LogContextPatch, LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

export type LogMethod<TContext extends LogContext = LogContext> = (
  message: string,
  meta?: LogMeta<TContext>,
) => void

/** One method per level, plus `child` to scope later lines to extra context. */
export type Logger<TContext extends LogContext = LogContext> = {
  readonly [Level in LogLevelName]: LogMethod<TContext>
} & {
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
