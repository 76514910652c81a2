import type { ConfigLayer, ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Keep only variables starting with this prefix, with the prefix removed. */
  prefix?: string
  /** Default: `process.env`, read on every `read()` */
  env?: NodeJS.ProcessEnv
}

export class EnvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.name = options.prefix ? `env:${options.prefix}` : "env"
  }

  async read(): Promise<ConfigLayer> {
    const { prefix = "", env = process.env } = this.options

    return Object.fromEntries(
      Object.entries(env)
        .filter(([key]) => key.startsWith(prefix))
        .map(([key, value]): [string, string | undefined] => [key.slice(prefix.length), value]),
    )
  }
}
