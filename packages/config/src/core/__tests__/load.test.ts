import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import type { ConfigSource } from "../../ports/source"
import { ConfigValidationError } from "../errors"
import { loadConfig } from "../load"

const schema = z.object({
  ATTEMPTS: z.coerce.number().int().min(1).default(3),
  ENDPOINT: z.string(),
})

describe("loadConfig", () => {
  it("coerces strings and fills defaults", async () => {
    const value = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { ENDPOINT: "https://billing.internal" } })],
    })

    expect(value).toEqual({ ATTEMPTS: 3, ENDPOINT: "https://billing.internal" })
  })

  it("lets later sources override earlier ones", async () => {
    const value = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { ENDPOINT: "https://a", ATTEMPTS: "2" } }),
        new ObjectSource({ ATTEMPTS: 9 }),
      ],
    })

    expect(value).toEqual({ ATTEMPTS: 9, ENDPOINT: "https://a" })
  })

  it("never lets an undefined value hide an earlier one", async () => {
    const value = await loadConfig({
      schema,
      sources: [new ObjectSource({ ENDPOINT: "https://a" }), new ObjectSource({ ENDPOINT: undefined })],
    })

    expect(value.ENDPOINT).toBe("https://a")
  })

  it("applies layers in list order even when sources resolve out of order", async () => {
    const slow: ConfigSource = {
      name: "slow",
      read: () => new Promise((resolve) => setTimeout(() => resolve({ ENDPOINT: "https://slow" }), 5)),
    }

    const value = await loadConfig({
      schema,
      sources: [slow, new ObjectSource({ ENDPOINT: "https://fast" })],
    })

    expect(value.ENDPOINT).toBe("https://fast")
  })

  it("reports every issue and the sources it read", async () => {
    const error = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { ATTEMPTS: "0" } }), new ObjectSource({}, "tests")],
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigValidationError)
    if (!(error instanceof ConfigValidationError)) return

    expect(error.code).toBe("config_invalid")
    expect(error.isOperational).toBe(false)
    expect(error.message.startsWith("Invalid configuration:\n")).toBe(true)
    expect(error.context.sources).toEqual(["env", "object:tests"])
    expect(error.context.issues).toHaveLength(2)
  })
})
