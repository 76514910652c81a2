import type { RetryConfig, RetryConfigOptions } from "../ports/retry-config"
import { RetryConfigError } from "./errors"

/**
 * Validate options and freeze them into a RetryConfig.
 *
 * @throws RetryConfigError if `maxAttempts` is not an integer >= 1 or a
 * callback is missing
 */
export function createRetryConfig<T, E = Error>(
  options: RetryConfigOptions<T, E>,
): RetryConfig<T, E> {
  const { maxAttempts, backoffFunction, retryPredicate, observer = {} } = options

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RetryConfigError(
      `maxAttempts must be an integer >= 1 (got ${maxAttempts})`,
      "maxAttempts",
      maxAttempts,
    )
  }

  if (typeof backoffFunction !== "function") {
    throw new RetryConfigError(
      "backoffFunction must be a function",
      "backoffFunction",
      backoffFunction,
    )
  }

  if (typeof retryPredicate !== "function") {
    throw new RetryConfigError(
      "retryPredicate must be a function",
      "retryPredicate",
      retryPredicate,
    )
  }

  return Object.freeze({
    maxAttempts,
    backoffFunction,
    retryPredicate,
    observer,
  })
}
