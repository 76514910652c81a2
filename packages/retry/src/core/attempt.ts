import type { Attempt } from "../ports/attempt"
import type { Outcome } from "../ports/outcome"

export function createAttempt<T, E>(
  attemptNr: number,
  outcome: Outcome<T, E>,
): Attempt<T, E> {
  const attempt: Attempt<T, E> = { attemptNr, outcome }
  return Object.freeze(attempt)
}
