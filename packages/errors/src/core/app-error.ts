import type { AppError, ErrorCode } from "../ports/app-error"
import { BaseError } from "./base-error"

/**
 * Structural check, so errors from another copy of this package (or any
 * look-alike) are recognized too.
 */
export function isAppError(value: unknown): value is AppError {
  if (!(value instanceof Error)) return false

  return (
    "code" in value &&
    typeof value.code === "string" &&
    value.code === value.code.toLowerCase() &&
    "context" in value &&
    typeof value.context === "object" &&
    value.context !== null &&
    "isRetryable" in value &&
    typeof value.isRetryable === "boolean" &&
    "isOperational" in value &&
    typeof value.isOperational === "boolean" &&
    "timestamp" in value &&
    value.timestamp instanceof Date
  )
}

/**
 * Normalize a thrown value. AppErrors pass through untouched; anything else
 * becomes a non-retryable, non-operational BaseError with the original as
 * `cause`.
 */
export function toAppError(thrown: unknown, code: ErrorCode = "unknown"): AppError {
  if (isAppError(thrown)) return thrown

  const message =
    thrown instanceof Error
      ? thrown.message
      : typeof thrown === "string"
        ? thrown
        : "Non-error value thrown"

  return new BaseError(message, { code, cause: thrown, isOperational: false })
}
