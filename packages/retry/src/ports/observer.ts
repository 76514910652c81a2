import type { Attempt } from "./attempt"

/**
 * Lifecycle hooks, one per attempt category.
 *
 * @remarks
 * Exactly one hook runs per attempt, and the retrier waits for it before
 * moving on. Hooks should not throw. If one does, the retrier treats it as
 * a programmer error and propagates it, ending the loop.
 */
export interface RetryObserver<T, E = Error> {
  onSuccess?(attempt: Attempt<T, E>): void | Promise<void>

  /** Failure will be retried after a backoff. */
  onRetriableError?(attempt: Attempt<T, E>): void | Promise<void>

  /** Failure rejected by the retry predicate. Terminal. */
  onNonRetriableError?(attempt: Attempt<T, E>): void | Promise<void>

  /** Retriable failure on the last allowed attempt. Terminal. */
  onMaxAttemptsReached?(attempt: Attempt<T, E>): void | Promise<void>
}
