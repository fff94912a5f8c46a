export type LoggerErrorCode =
  | "serialization_unsupported"
  | "write_failed"
  | "invalid_config"
  | "already_initialized"

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (reasons, paths, etc.) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type LoggerErrorOptions<C extends LoggerErrorCode = LoggerErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Serialized error shape, safe to pass to `JSON.stringify`.
 */
export type SerializedLoggerError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  cause?: SerializedLoggerError
}>

export class LoggerError<C extends LoggerErrorCode = LoggerErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp: Date

  constructor(message: string, options: LoggerErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedLoggerError {
    return serializeLoggerError(this)
  }
}

/**
 * Serialize a LoggerError (or whatever ended up in its cause chain) to a
 * consistent shape.
 */
export function serializeLoggerError(err: unknown): SerializedLoggerError {
  if (err instanceof LoggerError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeLoggerError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeLoggerError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    timestamp: new Date().toISOString(),
  }
}

export function isLoggerError(e: unknown): e is LoggerError {
  return e instanceof LoggerError
}
