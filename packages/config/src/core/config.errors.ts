import { BaseError } from "@loungekit/errors"

export class ConfigError extends BaseError<"config_invalid" | "config_source_failed"> {
  static invalid(details: string, issues: readonly unknown[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { issues },
    })
  }

  static sourceFailed(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Configuration source "${source}" could not be loaded`, {
      code: "config_source_failed",
      context: { source },
      cause,
    })
  }
}
