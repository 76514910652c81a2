import { isAbortError, type Sleeper, SystemClock } from "@persevere/clock"
import { type Logger, NullLogger } from "@persevere/logger"
import type { Attempt } from "../ports/attempt"
import type { AttemptContext } from "../ports/attempt-context"
import type { RetryObserver } from "../ports/observer"
import type { Operation } from "../ports/operation"
import type { Outcome } from "../ports/outcome"
import type { ExecuteOptions, IRetrier } from "../ports/retrier"
import type { RetryConfig } from "../ports/retry-config"
import { createAttempt } from "./attempt"
import { type AttemptCategory, classifyAttempt, isTerminal } from "./classify-attempt"
import { RetryCancelledError } from "./errors"

export type RetrierDeps = {
  /** Sleeps between attempts. Default: SystemClock */
  clock?: Sleeper
  logger?: Logger
}

const OBSERVER_HOOK = {
  success: "onSuccess",
  non_retriable_failure: "onNonRetriableError",
  attempts_exhausted: "onMaxAttemptsReached",
  retriable_failure: "onRetriableError",
} as const satisfies Record<AttemptCategory, keyof RetryObserver<unknown, unknown>>

export function createRetrier<T, E = Error>(
  config: RetryConfig<T, E>,
  deps: RetrierDeps = {},
): IRetrier<T, E> {
  return new Retrier(config, {
    clock: deps.clock ?? new SystemClock(),
    logger: deps.logger ?? new NullLogger(),
  })
}

class Retrier<T, E> implements IRetrier<T, E> {
  constructor(
    private readonly config: RetryConfig<T, E>,
    private readonly deps: Required<RetrierDeps>,
  ) {}

  async executeWithRetries(
    operation: Operation<T, E>,
    options: ExecuteOptions = {},
  ): Promise<Outcome<T, E>> {
    const { signal } = options

    for (let attemptNr = 1; ; attemptNr++) {
      const outcome = await operation(this.buildContext(attemptNr, signal))
      const attempt = createAttempt(attemptNr, outcome)
      const category = classifyAttempt(attempt, this.config)

      await this.notify(category, attempt)

      if (isTerminal(category)) return outcome

      await this.backoff(attemptNr, signal)
    }
  }

  private async notify(category: AttemptCategory, attempt: Attempt<T, E>): Promise<void> {
    await this.config.observer[OBSERVER_HOOK[category]]?.(attempt)
  }

  private async backoff(attemptNr: number, signal: AbortSignal | undefined): Promise<void> {
    const delayMs = this.config.backoffFunction(attemptNr).milliseconds

    this.deps.logger.debug("Backing off before next attempt", {
      attemptNr,
      delayMs,
    })

    try {
      await this.deps.clock.sleep(delayMs, signal)
    } catch (error) {
      if (isAbortError(error)) {
        throw new RetryCancelledError(attemptNr, signal?.reason ?? error)
      }
      throw error
    }

    // a clock may resolve early on abort instead of rejecting
    if (signal?.aborted) {
      throw new RetryCancelledError(attemptNr, signal.reason)
    }
  }

  private buildContext(attemptNr: number, signal?: AbortSignal): AttemptContext {
    return {
      attemptNr,
      ...(signal && { signal }),
    }
  }
}
