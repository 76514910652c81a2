import { describeSleeperContract } from "../../ports/__tests__/sleeper.contract"
import { FakeClock } from "../fake-clock"

describeSleeperContract("FakeClock", () => new FakeClock())

describe("FakeClock", () => {
  it("records backoff delays in order and sums them", async () => {
    const clock = new FakeClock()

    await clock.sleep(100)
    await clock.sleep(200)
    await clock.sleep(400)

    expect(clock.sleeps).toEqual([100, 200, 400])
    expect(clock.elapsedMs).toBe(700)
  })

  it("records a negative delay but does not count it as elapsed", async () => {
    const clock = new FakeClock()

    await clock.sleep(-5)

    expect(clock.sleeps).toEqual([-5])
    expect(clock.elapsedMs).toBe(0)
  })

  it("leaves no trace of a cancelled wait", async () => {
    const clock = new FakeClock()
    const controller = new AbortController()
    controller.abort()

    await expect(clock.sleep(50, controller.signal)).rejects.toThrow("Aborted")

    expect(clock.sleeps).toEqual([])
    expect(clock.elapsedMs).toBe(0)
  })

  it("hands out copies of the recorded delays", async () => {
    const clock = new FakeClock()
    await clock.sleep(1)

    const before = clock.sleeps
    await clock.sleep(2)

    expect(before).toEqual([1])
  })
})
