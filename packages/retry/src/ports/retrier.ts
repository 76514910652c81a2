import type { Operation } from "./operation"
import type { Outcome } from "./outcome"

export type ExecuteOptions = {
  /**
   * Cancels the retry loop.
   *
   * Checked at the backoff wait only; an operation that wants to stop early
   * reads it from its AttemptContext.
   */
  signal?: AbortSignal
}

/**
 * Runs an operation until it succeeds, fails non-retriably, or runs out of
 * attempts.
 *
 * @remarks
 * Throwing behavior:
 * - Terminal failures are returned as a Failure, never thrown
 * - Aborted backoff → throws RetryCancelledError
 * - Errors thrown by the operation, the predicate, the backoff function or
 *   an observer propagate unchanged
 */
export interface IRetrier<T, E = Error> {
  executeWithRetries(
    operation: Operation<T, E>,
    options?: ExecuteOptions,
  ): Promise<Outcome<T, E>>
}
