export interface AttemptContext {
  /** 1-indexed number of the attempt about to run */
  attemptNr: number

  /** Signal for cooperative cancellation, when the caller passed one */
  signal?: AbortSignal
}
