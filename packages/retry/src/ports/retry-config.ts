import type { BackoffFunction } from "@persevere/backoff"
import type { RetryObserver } from "./observer"
import type { RetryPredicate } from "./predicates"

/**
 * Validated, immutable retry configuration.
 *
 * @remarks
 * `maxAttempts` is total tries, not retries.
 * - maxAttempts=1 → try once, no retry
 * - maxAttempts=3 → try once + up to 2 retries
 *
 * Build with `createRetryConfig()`; safe to share between retriers.
 */
export interface RetryConfig<T = unknown, E = Error> {
  /** Total attempts (not retries). Integer >= 1 */
  readonly maxAttempts: number

  /** Delay after a retriable failure, indexed by the failed attempt's number */
  readonly backoffFunction: BackoffFunction

  /** When to retry a failure */
  readonly retryPredicate: RetryPredicate<E>

  /**
   * Lifecycle hooks. Held by reference, not copied or frozen: reassigning a
   * hook on this object later changes what every retrier sharing the config
   * calls.
   */
  readonly observer: RetryObserver<T, E>
}

export type RetryConfigOptions<T = unknown, E = Error> = Omit<
  RetryConfig<T, E>,
  "observer"
> & {
  observer?: RetryObserver<T, E>
}
