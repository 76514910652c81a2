import { BaseError } from "@persevere/errors"
import { z } from "zod"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(error: z.ZodError, sources: readonly string[]) {
    super(`Invalid configuration:\n${z.prettifyError(error)}`, {
      code: "config_invalid",
      context: { issues: error.issues, sources },
      isOperational: false,
    })
  }
}
