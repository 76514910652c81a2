import type { BackoffFunction, Delay } from "../../ports/backoff-function"
import { requireNonNegativeDelay } from "../validate"

export interface ConstantOptions {
  /** Fixed delay between attempts */
  delay: Delay
}

export function constant(options: ConstantOptions): BackoffFunction {
  const ms = requireNonNegativeDelay("delay", options.delay)

  return (_attemptNr: number): Delay => ({ milliseconds: ms })
}
