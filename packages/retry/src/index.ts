export { createAttempt } from "./core/attempt"
export { type AttemptCategory, classifyAttempt, isTerminal } from "./core/classify-attempt"
export { RetryCancelledError, RetryConfigError } from "./core/errors"
export { loggingObserver } from "./core/logging-observer"
export { capture, failure, isFailure, isSuccess, success } from "./core/outcome"
export { retryIfRetryable } from "./core/predicates"
export { createRetrier, type RetrierDeps } from "./core/retrier"
export { createRetryConfig } from "./core/retry-config"
export {
  loadRetrySettings,
  type RetryBehavior,
  type RetrySettings,
  retryConfigFromSettings,
  retrySettingsSchema,
} from "./core/retry-settings"
export type { Attempt } from "./ports/attempt"
export type { AttemptContext } from "./ports/attempt-context"
export type { RetryObserver } from "./ports/observer"
export type { Operation } from "./ports/operation"
export type { Failure, Outcome, Success } from "./ports/outcome"
export type { RetryPredicate } from "./ports/predicates"
export type { ExecuteOptions, IRetrier } from "./ports/retrier"
export type { RetryConfig, RetryConfigOptions } from "./ports/retry-config"
