export {
  type CappedExponentialOptions,
  cappedExponential,
} from "./core/strategies/capped-exponential"
export { type ConstantOptions, constant } from "./core/strategies/constant"
export { type LinearOptions, linear } from "./core/strategies/linear"
export type {
  BackoffFunction,
  Delay,
  Milliseconds,
  MillisecondsDelay,
} from "./ports/backoff-function"
