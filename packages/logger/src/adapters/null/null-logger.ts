import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger, LogMethod } from "../../ports/logger"

const discard = (): void => {}

/** Drops every line. The retrier's default when no logger is injected. */
export class NullLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  readonly trace: LogMethod<TContext> = discard
  readonly debug: LogMethod<TContext> = discard
  readonly info: LogMethod<TContext> = discard
  readonly warn: LogMethod<TContext> = discard
  readonly error: LogMethod<TContext> = discard
  readonly fatal: LogMethod<TContext> = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}
