/** Duration in milliseconds. */
export type Milliseconds = number

/**
 * Waits out the delay between attempts.
 *
 * @remarks
 * A wait whose `signal` is aborted, before or during the wait, rejects with
 * an `AbortError` DOMException. A cancelled wait never resolves.
 */
export interface Sleeper {
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}
