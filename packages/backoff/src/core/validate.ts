import type { Delay } from "../ports/backoff-function"

export function requireNonNegativeDelay(name: string, delay: Delay): number {
  const ms = delay.milliseconds

  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${name}.milliseconds must be finite and >= 0 (got ${ms})`)
  }

  return ms
}
