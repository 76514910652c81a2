export type Milliseconds = number
export type MillisecondsDelay = { milliseconds: Milliseconds }

export type Delay = MillisecondsDelay

/**
 * Delay to wait before the next attempt.
 *
 * `attemptNr` is the 1-indexed number of the attempt that just failed.
 * Implementations must be pure and return finite, non-negative delays.
 */
export type BackoffFunction = (attemptNr: number) => Delay
