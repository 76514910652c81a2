import { cappedExponential } from "@persevere/backoff"
import { type ConfigSource, EnvSource, loadConfig } from "@persevere/config"
import { z } from "zod"
import type { RetryObserver } from "../ports/observer"
import type { RetryPredicate } from "../ports/predicates"
import type { RetryConfig } from "../ports/retry-config"
import { createRetryConfig } from "./retry-config"

export const retrySettingsSchema = z.object({
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(100),
  RETRY_BACKOFF_BASE: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
})

export type RetrySettings = z.infer<typeof retrySettingsSchema>

/**
 * Load retry settings from config sources (process env by default).
 *
 * @throws ConfigValidationError on invalid values
 */
export async function loadRetrySettings(
  sources: readonly ConfigSource[] = [new EnvSource()],
): Promise<RetrySettings> {
  return loadConfig<RetrySettings>({ schema: retrySettingsSchema, sources })
}

export type RetryBehavior<T, E> = {
  retryPredicate: RetryPredicate<E>
  observer?: RetryObserver<T, E>
}

/** Build a RetryConfig with capped exponential backoff from loaded settings. */
export function retryConfigFromSettings<T, E = Error>(
  settings: RetrySettings,
  behavior: RetryBehavior<T, E>,
): RetryConfig<T, E> {
  return createRetryConfig<T, E>({
    maxAttempts: settings.RETRY_MAX_ATTEMPTS,
    backoffFunction: cappedExponential({
      initial: { milliseconds: settings.RETRY_INITIAL_DELAY_MS },
      base: settings.RETRY_BACKOFF_BASE,
      max: { milliseconds: settings.RETRY_MAX_DELAY_MS },
    }),
    retryPredicate: behavior.retryPredicate,
    ...(behavior.observer && { observer: behavior.observer }),
  })
}
