import type { BackoffFunction, Delay } from "../../ports/backoff-function"
import { requireNonNegativeDelay } from "../validate"

export interface CappedExponentialOptions {
  /** Delay after the first failed attempt */
  initial: Delay

  /** Multiplier per attempt. Must be >= 1. Default: 2 */
  base?: number

  /** Ceiling for every delay */
  max: Delay
}

/**
 * `delay(n) = floor(min(initial * base^(n-1), max))`
 *
 * Saturates at `max` once the exponential overflows.
 */
export function cappedExponential(opts: CappedExponentialOptions): BackoffFunction {
  const { base = 2 } = opts
  const initialMs = requireNonNegativeDelay("initial", opts.initial)
  const maxMs = requireNonNegativeDelay("max", opts.max)

  if (!Number.isFinite(base) || base < 1) {
    throw new RangeError(`base must be finite and >= 1 (got ${base})`)
  }

  return (attemptNr: number): Delay => {
    const exponential = initialMs * base ** (attemptNr - 1)

    // 0 * Infinity
    if (Number.isNaN(exponential)) return { milliseconds: 0 }

    return { milliseconds: Math.floor(Math.min(exponential, maxMs)) }
  }
}
