/** `true` if the failure should be retried. */
export type RetryPredicate<E = Error> = (error: E) => boolean
