export { NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerOptions } from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger, LogMethod } from "./ports/logger"
