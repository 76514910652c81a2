import { BaseError } from "@persevere/errors"

export class RetryConfigError extends BaseError<"retry_config_invalid"> {
  constructor(message: string, field: string, value: unknown) {
    super(message, {
      code: "retry_config_invalid",
      context: { field, value },
      isOperational: false,
    })
  }
}

/**
 * The backoff wait was cancelled. The retry loop was abandoned after
 * `attemptNr` and no further attempt was made.
 */
export class RetryCancelledError extends BaseError<"retry_cancelled"> {
  readonly attemptNr: number

  constructor(attemptNr: number, cause: unknown) {
    super(`Retry cancelled during backoff after attempt ${attemptNr}`, {
      code: "retry_cancelled",
      context: { attemptNr },
      cause,
    })

    this.attemptNr = attemptNr
  }
}
