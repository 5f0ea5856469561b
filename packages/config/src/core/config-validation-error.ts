import { BaseError } from "@idpack/errors"

export type ConfigIssue = { path: string; message: string }

export class ConfigValidationError extends BaseError<"config_validation_failed"> {
  constructor(message: string, issues: readonly ConfigIssue[]) {
    super(message, {
      code: "config_validation_failed",
      context: { issues },
      isOperational: false,
    })
  }
}
