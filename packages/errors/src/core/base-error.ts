import type { AppError, ErrorCode, SerializedCause, SerializedError } from "../ports/app-error"

export type BaseErrorOptions<C extends ErrorCode> = {
  code: C
  context?: Record<string, unknown>
  cause?: unknown
  /** Default: false */
  isRetryable?: boolean
  /** Default: true */
  isOperational?: boolean
}

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: Readonly<Record<string, unknown>>
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(message: string, options: BaseErrorOptions<C>) {
    const { code, context = {}, cause, isRetryable = false, isOperational = true } = options

    super(message, cause === undefined ? undefined : { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isRetryable = isRetryable
    this.isOperational = isOperational
  }

  /** JSON view for transport; `cause` chains of BaseErrors are kept in full. */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isRetryable: this.isRetryable,
      isOperational: this.isOperational,
      timestamp: this.timestamp.toISOString(),
      ...(this.cause !== undefined && { cause: serializeCause(this.cause) }),
    }
  }
}

function serializeCause(cause: unknown): SerializedError | SerializedCause {
  if (cause instanceof BaseError) return cause.toJSON()
  if (cause instanceof Error) return { name: cause.name, message: cause.message }

  return { name: typeof cause, message: String(cause) }
}
