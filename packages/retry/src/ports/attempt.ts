import type { Outcome } from "./outcome"

export interface Attempt<T, E = Error> {
  /** 1-indexed; the first attempt is 1 */
  readonly attemptNr: number

  readonly outcome: Outcome<T, E>
}
