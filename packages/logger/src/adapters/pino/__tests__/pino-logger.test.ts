import { Writable } from "node:stream"
import pino from "pino"
import { describeLoggerContract, type CapturedLine } from "../../../ports/__tests__/logger.contract"
import { logLevelNames } from "../../../ports/log-level"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function jsonLines() {
  const parsed: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, done) {
      for (const line of chunk.toString("utf8").split("\n")) {
        if (line.trim()) parsed.push(JSON.parse(line))
      }
      done()
    },
  })

  return { destination, parsed }
}

function toCaptured(fields: Record<string, unknown>): CapturedLine {
  const label = pino.levels.labels[Number(fields.level)]
  const level = logLevelNames.find((name) => name === label)
  if (!level) throw new Error(`unexpected pino level ${String(fields.level)}`)

  return { level, fields }
}

describeLoggerContract("PinoLogger", (level) => {
  const { destination, parsed } = jsonLines()

  return {
    logger: createPinoLogger({ level, destination }),
    lines: () => parsed.map(toCaptured),
  }
})

describe("createPinoLogger", () => {
  it("puts the root context on every line", () => {
    const { destination, parsed } = jsonLines()

    createPinoLogger({ destination }, { service: "billing" }).info("ready")

    expect(parsed[0]).toMatchObject({ service: "billing", msg: "ready", level: 30 })
  })

  it("serializes err with its cause chain", () => {
    const { destination, parsed } = jsonLines()
    const logger = createPinoLogger({ destination })

    const err = new Error("upstream failed", { cause: new Error("connection reset") })
    logger.error("Attempt failed with non-retriable error", { attemptNr: 1, err })

    expect(parsed[0]?.err).toMatchObject({
      type: "Error",
      message: "upstream failed",
      cause: { type: "Error", message: "connection reset" },
    })
  })

  it("writes JSON even when prettify is requested alongside a destination", () => {
    const { destination, parsed } = jsonLines()

    createPinoLogger({ destination, prettify: true }).warn("plain")

    expect(parsed).toEqual([expect.objectContaining({ msg: "plain", level: 40 })])
  })

  it("defaults to the info level", () => {
    const { destination, parsed } = jsonLines()
    const logger = createPinoLogger({ destination })

    logger.debug("hidden")
    logger.info("shown")

    expect(parsed.map((line) => line.msg)).toEqual(["shown"])
  })
})

describe("PinoLogger", () => {
  it("wraps an application's own pino instance", () => {
    const { destination, parsed } = jsonLines()
    const appPino = pino({ level: "debug", base: { service: "orders" } }, destination)

    new PinoLogger(appPino).child({ operation: "reserve-stock" }).debug("wrapped")

    expect(parsed[0]).toMatchObject({
      service: "orders",
      operation: "reserve-stock",
      msg: "wrapped",
    })
  })
})
