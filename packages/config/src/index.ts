export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { ConfigValidationError } from "./core/errors"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { ConfigLayer, ConfigSource } from "./ports/source"
