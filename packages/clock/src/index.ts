export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { createAbortError, isAbortError } from "./core/abort-error"
export type { Milliseconds, Sleeper } from "./ports/sleeper"
