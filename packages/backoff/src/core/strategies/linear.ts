import type { BackoffFunction, Delay } from "../../ports/backoff-function"
import { requireNonNegativeDelay } from "../validate"

export interface LinearOptions {
  initial: Delay

  /** Amount to add per attempt */
  increment: Delay
}

export function linear(opts: LinearOptions): BackoffFunction {
  const initialMs = requireNonNegativeDelay("initial", opts.initial)
  const incrementMs = requireNonNegativeDelay("increment", opts.increment)

  return (attemptNr: number): Delay => ({
    milliseconds: initialMs + incrementMs * (attemptNr - 1),
  })
}
