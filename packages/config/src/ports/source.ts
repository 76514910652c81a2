/** One layer of raw, unvalidated settings. */
export type ConfigLayer = Readonly<Record<string, unknown>>

/**
 * Supplies a layer of settings. Sources only read; merging and validation
 * happen in `loadConfig`. A key mapped to `undefined` counts as unset.
 */
export interface ConfigSource {
  /** Shown in validation errors, e.g. `"env"` or `"object:overrides"` */
  readonly name: string

  read(): Promise<ConfigLayer>
}
