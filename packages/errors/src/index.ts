export { isAppError, toAppError } from "./core/app-error"
export { BaseError, type BaseErrorOptions } from "./core/base-error"
export type {
  AppError,
  ErrorCode,
  SerializedCause,
  SerializedError,
} from "./ports/app-error"
