import pino, { type DestinationStream, type Logger as Pino, type LoggerOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger, LogMethod } from "../../ports/logger"

export type PinoLoggerOptions = {
  /** Default: "info" */
  level?: LogLevelName
  /** Human-readable output through pino-pretty. Ignored when `destination` is set. */
  prettify?: boolean
  /** Write JSON lines here instead of stdout. */
  destination?: DestinationStream
}

/** Adapts an existing pino instance to the Logger port. */
export class PinoLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  readonly trace: LogMethod<TContext> = (message, meta) => this.write("trace", message, meta)
  readonly debug: LogMethod<TContext> = (message, meta) => this.write("debug", message, meta)
  readonly info: LogMethod<TContext> = (message, meta) => this.write("info", message, meta)
  readonly warn: LogMethod<TContext> = (message, meta) => this.write("warn", message, meta)
  readonly error: LogMethod<TContext> = (message, meta) => this.write("error", message, meta)
  readonly fatal: LogMethod<TContext> = (message, meta) => this.write("fatal", message, meta)

  constructor(private readonly pino: Pino) {}

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.pino.child(context))
  }

  private write(level: LogLevelName, message: string, meta: LogMeta<TContext> = {}): void {
    this.pino[level](meta, message)
  }
}

/** Build a root pino logger with `err` cause serialization and wrap it. */
export function createPinoLogger<TContext extends LogContext = LogContext>(
  options: PinoLoggerOptions = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  const { level = "info", prettify = false, destination } = options

  const pinoOptions: LoggerOptions = {
    level,
    base: context,
    serializers: { err: errWithCause },
    // the pretty transport runs in a worker with its own output stream
    ...(prettify &&
      !destination && {
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
        },
      }),
  }

  const root = destination ? pino(pinoOptions, destination) : pino(pinoOptions)

  return new PinoLogger<TContext>(root)
}
