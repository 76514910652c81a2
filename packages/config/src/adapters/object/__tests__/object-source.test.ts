import { ObjectSource } from "../object-source"

describe("ObjectSource", () => {
  it("is named after its label", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
    expect(new ObjectSource({}, "tests").name).toBe("object:tests")
  })

  it("returns a copy of its values", async () => {
    const source = new ObjectSource({ RETRY_MAX_ATTEMPTS: 5 })

    const layer = await source.read()

    expect(layer).toEqual({ RETRY_MAX_ATTEMPTS: 5 })
    expect(await source.read()).not.toBe(layer)
  })
})
