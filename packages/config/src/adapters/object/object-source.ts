import type { ConfigLayer, ConfigSource } from "../../ports/source"

/** Fixed values, typically placed last to override everything else. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: ConfigLayer,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async read(): Promise<ConfigLayer> {
    return { ...this.values }
  }
}
