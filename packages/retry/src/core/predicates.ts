import { isAppError } from "@persevere/errors"

/** Retry AppErrors flagged `isRetryable`; anything else is final. */
export function retryIfRetryable(error: unknown): boolean {
  return isAppError(error) && error.isRetryable
}
