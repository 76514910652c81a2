export type Success<T> = {
  readonly ok: true
  readonly value: T
}

export type Failure<E = Error> = {
  readonly ok: false
  readonly error: E
}

/** Result of one attempt: exactly one of Success or Failure. */
export type Outcome<T, E = Error> = Success<T> | Failure<E>
