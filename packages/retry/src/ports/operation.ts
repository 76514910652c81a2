import type { AttemptContext } from "./attempt-context"
import type { Outcome } from "./outcome"

/**
 * Operation to retry.
 *
 * Reports failure by returning a Failure, not by throwing. A throw is
 * treated as a programmer error and propagates out of the retrier.
 */
export type Operation<T, E = Error> = (
  ctx: AttemptContext,
) => Outcome<T, E> | Promise<Outcome<T, E>>
