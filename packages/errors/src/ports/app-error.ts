/** snake_case identifier, e.g. `"retry_cancelled"`. */
export type ErrorCode = Lowercase<string>

/**
 * Error shape shared across the workspace.
 *
 * Retry predicates read `isRetryable`; everything else is for logs and
 * callers that branch on `code`.
 */
export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: Readonly<Record<string, unknown>>
  readonly isRetryable: boolean
  /** `false` marks a programmer error, such as an invalid retry config. */
  readonly isOperational: boolean
  readonly timestamp: Date
}

/** Summary of a cause that is not itself an AppError. */
export type SerializedCause = Readonly<{ name: string; message: string }>

export type SerializedError = Readonly<{
  name: string
  code: ErrorCode
  message: string
  context: Record<string, unknown>
  isRetryable: boolean
  isOperational: boolean
  /** ISO 8601 */
  timestamp: string
  cause?: SerializedError | SerializedCause
}>
