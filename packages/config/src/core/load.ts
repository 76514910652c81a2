import type { ZodType } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/source"
import { ConfigValidationError } from "./errors"

export type LoadConfigOptions<T> = {
  schema: ZodType<T>
  /** Applied in order, later layers win. Default: a single unprefixed EnvSource */
  sources?: readonly ConfigSource[]
}

/**
 * Read every source, merge the layers and validate the result.
 *
 * @throws ConfigValidationError when the merged settings fail the schema
 */
export async function loadConfig<T>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<T> {
  const layers = await Promise.all(sources.map((source) => source.read()))

  const merged = Object.fromEntries(
    layers.flatMap((layer) => Object.entries(layer).filter(([, value]) => value !== undefined)),
  )

  const parsed = schema.safeParse(merged)

  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error,
      sources.map((source) => source.name),
    )
  }

  return parsed.data
}
