import { type AppError, toAppError } from "@persevere/errors"
import type { Failure, Outcome, Success } from "../ports/outcome"

export function success<T>(value: T): Success<T> {
  const outcome: Success<T> = { ok: true, value }
  return Object.freeze(outcome)
}

export function failure<E>(error: E): Failure<E> {
  const outcome: Failure<E> = { ok: false, error }
  return Object.freeze(outcome)
}

export function isSuccess<T, E>(outcome: Outcome<T, E>): outcome is Success<T> {
  return outcome.ok
}

export function isFailure<T, E>(outcome: Outcome<T, E>): outcome is Failure<E> {
  return !outcome.ok
}

/**
 * Run a function that signals errors by throwing and capture the result as
 * an Outcome.
 *
 * Thrown values are mapped with `mapError`, or converted with `toAppError`
 * when none is given.
 *
 * @example
 * ```ts
 * const outcome = await retrier.executeWithRetries(() =>
 *   capture(() => client.fetchInvoice(id)),
 * )
 * ```
 */
export function capture<T>(fn: () => T | Promise<T>): Promise<Outcome<T, AppError>>
export function capture<T, E>(
  fn: () => T | Promise<T>,
  mapError: (thrown: unknown) => E,
): Promise<Outcome<T, E>>
export async function capture<T, E>(
  fn: () => T | Promise<T>,
  mapError?: (thrown: unknown) => E,
): Promise<Outcome<T, E | AppError>> {
  try {
    return success(await fn())
  } catch (thrown) {
    return failure(mapError ? mapError(thrown) : toAppError(thrown))
  }
}
