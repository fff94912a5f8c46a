import { LoggerError } from "./logger-error"

export type SerializationFailureReason = "not_object" | "invalid_json"

/** The extra-fields payload cannot be represented as a JSON object. */
export class SerializationUnsupportedError extends LoggerError<"serialization_unsupported"> {
  readonly reason: SerializationFailureReason

  constructor(reason: SerializationFailureReason, cause?: unknown) {
    super(
      reason === "not_object"
        ? "the data cannot be converted into a JSON object"
        : "the data cannot be converted into JSON",
      { code: "serialization_unsupported", context: { reason }, cause },
    )
    this.reason = reason
  }
}

/** The writer rejected a formatted line. */
export class WriteFailedError extends LoggerError<"write_failed"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "write_failed", cause })
  }
}

export class LoggerConfigError extends LoggerError<"invalid_config"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "invalid_config", cause })
  }
}

export class LoggerAlreadyInitializedError extends LoggerError<"already_initialized"> {
  constructor() {
    super("a global logger is already installed", { code: "already_initialized" })
  }
}
