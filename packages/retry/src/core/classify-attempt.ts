import type { Attempt } from "../ports/attempt"
import type { RetryConfig } from "../ports/retry-config"

export type AttemptCategory =
  | "success"
  | "non_retriable_failure"
  | "attempts_exhausted"
  | "retriable_failure"

/**
 * Classify an attempt. First match wins:
 * success → non-retriable failure → attempts exhausted → retriable failure.
 */
export function classifyAttempt<T, E>(
  attempt: Attempt<T, E>,
  config: Pick<RetryConfig<T, E>, "maxAttempts" | "retryPredicate">,
): AttemptCategory {
  const { outcome, attemptNr } = attempt

  if (outcome.ok) return "success"
  if (!config.retryPredicate(outcome.error)) return "non_retriable_failure"
  if (attemptNr >= config.maxAttempts) return "attempts_exhausted"

  return "retriable_failure"
}

export function isTerminal(category: AttemptCategory): boolean {
  return category !== "retriable_failure"
}
