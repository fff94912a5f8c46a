import type { LogLevelName } from "./log-level"
import type { LogBindings, LogOrigin } from "./log-record"

export interface Logger {
  trace(message: string, origin?: LogOrigin): void
  debug(message: string, origin?: LogOrigin): void
  info(message: string, origin?: LogOrigin): void
  warn(message: string, origin?: LogOrigin): void
  error(message: string, origin?: LogOrigin): void

  log(level: LogLevelName, message: string, origin?: LogOrigin): void

  /** Whether a record at `level` for `target` would be written. */
  enabled(level: LogLevelName, target?: string): boolean

  /**
   * Creates a child logger that shares the parent's writer, filter and
   * extra-fields store, with `bindings` overlaid on the parent's.
   *
   * This is intended for scoping logs to a component (e.g. a `target` per
   * module) without repeating it at every call.
   */
  child(bindings: LogBindings): Logger
}
