import type { EpochNanos } from "@ecslog/clock"
import type { LogLevelName } from "./log-level"

/**
 * A log record as handed to the formatter.
 *
 * Everything except `timestamp`, `level`, `message` and `target` is
 * optional source-location metadata, which depends on how the call site
 * was instrumented.
 */
export type LogRecord = Readonly<{
  timestamp: EpochNanos
  level: LogLevelName
  /** Fully rendered message text. */
  message: string
  /** Dotted logical source identifier, e.g. `"billing.invoices"`. */
  target: string
  modulePath?: string
  /** Full path of the source file that issued the call. */
  filePath?: string
  line?: number
}>

/** Per-call or bound source-location overrides. */
export type LogOrigin = Partial<Pick<LogRecord, "target" | "modulePath" | "filePath" | "line">>

/** Fields a child logger binds for every record it emits. */
export type LogBindings = Partial<Pick<LogRecord, "target" | "modulePath">>
