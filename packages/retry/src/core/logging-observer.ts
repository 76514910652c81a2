import type { Logger } from "@persevere/logger"
import type { Attempt } from "../ports/attempt"
import type { RetryObserver } from "../ports/observer"

function errorOf<T, E>(attempt: Attempt<T, E>): E | undefined {
  return attempt.outcome.ok ? undefined : attempt.outcome.error
}

/**
 * Observer that logs every attempt, then forwards it to `next`.
 *
 * Success → debug, retriable failure → warn, terminal failures → error.
 */
export function loggingObserver<T, E = Error>(
  logger: Logger,
  next: RetryObserver<T, E> = {},
): RetryObserver<T, E> {
  return {
    async onSuccess(attempt) {
      logger.debug("Attempt succeeded", { attemptNr: attempt.attemptNr })
      await next.onSuccess?.(attempt)
    },

    async onRetriableError(attempt) {
      logger.warn("Attempt failed, retrying", {
        attemptNr: attempt.attemptNr,
        err: errorOf(attempt),
      })
      await next.onRetriableError?.(attempt)
    },

    async onNonRetriableError(attempt) {
      logger.error("Attempt failed with non-retriable error", {
        attemptNr: attempt.attemptNr,
        err: errorOf(attempt),
      })
      await next.onNonRetriableError?.(attempt)
    },

    async onMaxAttemptsReached(attempt) {
      logger.error("Attempt failed, max attempts reached", {
        attemptNr: attempt.attemptNr,
        err: errorOf(attempt),
      })
      await next.onMaxAttemptsReached?.(attempt)
    },
  }
}
