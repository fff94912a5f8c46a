import type { LogLevelName } from "../../ports/log-level"
import type { LogBindings, LogOrigin } from "../../ports/log-record"
import type { Logger } from "../../ports/logger"

/** Discards everything. Stands in for the global logger before `init()`. */
export class NullLogger implements Logger {
  trace(_message: string, _origin?: LogOrigin): void {}

  debug(_message: string, _origin?: LogOrigin): void {}

  info(_message: string, _origin?: LogOrigin): void {}

  warn(_message: string, _origin?: LogOrigin): void {}

  error(_message: string, _origin?: LogOrigin): void {}

  log(_level: LogLevelName, _message: string, _origin?: LogOrigin): void {}

  enabled(_level: LogLevelName, _target?: string): boolean {
    return false
  }

  child(_bindings: LogBindings): Logger {
    return this
  }
}

export function createNullLogger(): Logger {
  return new NullLogger()
}
