import { createAbortError } from "../core/abort-error"
import type { Milliseconds, Sleeper } from "../ports/sleeper"

/**
 * Sleeper for tests. Never waits: each `sleep()` is recorded and resolves
 * on the next microtask. Aborted signals reject like `SystemClock`.
 */
export class FakeClock implements Sleeper {
  private readonly recorded: Milliseconds[] = []

  /** Requested durations, oldest first. */
  get sleeps(): readonly Milliseconds[] {
    return [...this.recorded]
  }

  /** Sum of every recorded sleep. */
  get elapsedMs(): Milliseconds {
    return this.recorded.reduce((total, ms) => total + Math.max(0, ms), 0)
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw createAbortError()

    this.recorded.push(ms)
  }
}
