import { BaseError } from "@persevere/errors"
import { capture, failure, isFailure, isSuccess, success } from "../outcome"

describe("outcome", () => {
  it("builds frozen success and failure variants", () => {
    const error = new Error("nope")

    expect(success(42)).toEqual({ ok: true, value: 42 })
    expect(failure(error)).toEqual({ ok: false, error })
    expect(Object.isFrozen(success(42))).toBe(true)
    expect(Object.isFrozen(failure(error))).toBe(true)
  })

  it("narrows with isSuccess and isFailure", () => {
    const outcomes = [success("a"), failure(new Error("b"))]

    expect(outcomes.map((o) => isSuccess(o))).toEqual([true, false])
    expect(outcomes.map((o) => isFailure(o))).toEqual([false, true])
  })
})

describe("capture", () => {
  it("wraps a returned value in a success", async () => {
    await expect(capture(() => "done")).resolves.toEqual({ ok: true, value: "done" })
    await expect(capture(async () => 7)).resolves.toEqual({ ok: true, value: 7 })
  })

  it("keeps a thrown BaseError as the failure's error", async () => {
    const thrown = new BaseError("rate limited", { code: "rate_limited", isRetryable: true })

    const outcome = await capture(() => {
      throw thrown
    })

    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error).toBe(thrown)
  })

  it("wraps other thrown errors with toAppError", async () => {
    const thrown = new TypeError("socket hang up")

    const outcome = await capture(async () => {
      throw thrown
    })

    if (outcome.ok) throw new Error("expected a failure")
    expect(outcome.error).toBeInstanceOf(BaseError)
    expect(outcome.error.code).toBe("unknown")
    expect(outcome.error.message).toBe("socket hang up")
    expect(outcome.error.cause).toBe(thrown)
    expect(outcome.error.isRetryable).toBe(false)
    expect(outcome.error.isOperational).toBe(false)
  })

  it("maps thrown values with mapError when given", async () => {
    const mapError = vi.fn((thrown: unknown) => `mapped:${String(thrown)}`)

    const outcome = await capture(() => {
      throw "boom"
    }, mapError)

    expect(outcome).toEqual({ ok: false, error: "mapped:boom" })
    expect(mapError).toHaveBeenCalledExactlyOnceWith("boom")
  })

  it("does not call mapError on success", async () => {
    const mapError = vi.fn((thrown: unknown) => thrown)

    await capture(() => 1, mapError)

    expect(mapError).not.toHaveBeenCalled()
  })
})
