import { BaseError, type BaseErrorOptions } from "@crm-link/errors"

export const configErrorCodes = [
  "invalid_env",
  "unreadable_source",
  "schema_mismatch",
  "filesystem_error",
  "invalid_config",
] as const

/**
 * - `invalid_env`: a required environment variable is missing or empty
 * - `unreadable_source`: file content is not JSON, is empty, or is not an object
 * - `schema_mismatch`: decoded JSON has unknown, missing or mistyped keys
 * - `filesystem_error`: the file could not be opened or read
 * - `invalid_config`: a record was built from invalid fields
 */
export type ConfigErrorCode = (typeof configErrorCodes)[number]

export type ConfigErrorOptions = Pick<BaseErrorOptions<ConfigErrorCode>, "context" | "cause">

/**
 * Failure to produce a ConfigRecord. Always operational and never retryable:
 * the source has to be fixed and parsed again by a fresh parser.
 */
export class ConfigError extends BaseError<ConfigErrorCode> {
  constructor(code: ConfigErrorCode, message: string, options: ConfigErrorOptions = {}) {
    super(message, {
      ...options,
      code,
      isRetryable: false,
      isOperational: true,
    })
  }
}

export function isConfigError(err: unknown, code?: ConfigErrorCode): err is ConfigError {
  return err instanceof ConfigError && (code === undefined || err.code === code)
}
