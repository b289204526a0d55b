import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for AppError, structural so it also matches errors created by
 * another copy of this package.
 *
 * @example
 * ```ts
 * try {
 *   parser.parseConfig()
 * } catch (err) {
 *   if (isAppError(err) && err.code === "invalid_env") {
 *     console.error(err.context.missing)
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.name === "string" &&
    typeof e.message === "string" &&
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp)
  )
}
