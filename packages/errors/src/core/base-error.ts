import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Root of every error the packages throw. Subclasses narrow `C` to their own
 * code union and usually fix the two flags.
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(
    message: string,
    { code, context = {}, cause, isRetryable = false, isOperational = true }: BaseErrorOptions<C>,
  ) {
    super(message, { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isRetryable = isRetryable
    this.isOperational = isOperational

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Turns any thrown value into a {@link SerializedError}.
 *
 * A foreign `Error` is reported as code `"unknown"`, neither retryable nor
 * operational; a non-Error value becomes `NonErrorThrown` with the value in
 * `context.value`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const own = err instanceof BaseError ? err : undefined

  return {
    name: err.name,
    code: own?.code ?? "unknown",
    message: err.message,
    context: { ...own?.context },
    isRetryable: own?.isRetryable ?? false,
    isOperational: own?.isOperational ?? false,
    timestamp: (own?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack ? { stack: err.stack } : {}),
  }
}
