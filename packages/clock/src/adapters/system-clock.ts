import { createAbortError } from "../core/abort-error"
import type { Milliseconds, Sleeper } from "../ports/sleeper"

/** Largest delay `setTimeout` honors; anything above fires after 1ms. */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

/** Sleeps on real timers. Delays past the timer limit are waited in chunks. */
export class SystemClock implements Sleeper {
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(createAbortError())
        return
      }

      let remaining = ms
      let timer: ReturnType<typeof setTimeout> | undefined

      const onAbort = () => {
        clearTimeout(timer)
        reject(createAbortError())
      }

      const waitNextChunk = () => {
        if (remaining <= 0) {
          signal?.removeEventListener("abort", onAbort)
          resolve()
          return
        }

        const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS)
        remaining -= chunk
        timer = setTimeout(waitNextChunk, chunk)
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      waitNextChunk()
    })
  }
}
