export const logLevelNames = ["trace", "debug", "info", "warn", "error"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/** Filter threshold names: every level plus `off`. */
export const levelFilterNames = ["off", ...logLevelNames] as const

export type LevelFilterName = (typeof levelFilterNames)[number]

/**
 * Numeric log severity levels.
 *
 * These values define the ordering of log levels for comparison
 * and filtering (higher = more severe).
 */
export const LogLevels = {
  /** Finest-grained diagnostic information. */
  Trace: 10,
  /** Debug-level information useful during development and investigation. */
  Debug: 20,
  /** High-level informational messages about normal operation. */
  Info: 30,
  /** Indications of potential issues or unexpected situations. */
  Warn: 40,
  /** Errors that indicate a failure in the current operation. */
  Error: 50,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export const LEVEL_SEVERITY: Record<LogLevelName, LogLevel> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
}

/** Minimum severity let through by a filter threshold; `off` lets nothing through. */
export const FILTER_THRESHOLD: Record<LevelFilterName, number> = {
  off: Number.POSITIVE_INFINITY,
  ...LEVEL_SEVERITY,
}

/** Case-insensitive parse of a filter threshold (`"INFO"`, `"off"`, ...). */
export function parseLevelFilter(value: string): LevelFilterName | undefined {
  const lower = value.toLowerCase()

  return levelFilterNames.find((name) => name === lower)
}
