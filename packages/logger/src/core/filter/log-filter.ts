import {
  FILTER_THRESHOLD,
  LEVEL_SEVERITY,
  type LevelFilterName,
  type LogLevelName,
  logLevelNames,
} from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"

export type FilterDirective = Readonly<{
  /** Target prefix; absent for the global directive. */
  name?: string
  level: LevelFilterName
}>

/**
 * Decides which records reach the formatter.
 *
 * Directives are ordered by name length; the most specific directive whose
 * name is a prefix of the record's target decides.
 */
export class LogFilter {
  private readonly directives: readonly FilterDirective[]

  constructor(
    directives: readonly FilterDirective[],
    private readonly regex?: RegExp,
  ) {
    this.directives = [...directives].sort(
      (a, b) => (a.name?.length ?? 0) - (b.name?.length ?? 0),
    )
  }

  enabled(level: LogLevelName, target: string): boolean {
    for (let i = this.directives.length - 1; i >= 0; i--) {
      const directive = this.directives[i]
      if (!directive) continue

      if (directive.name === undefined || target.startsWith(directive.name)) {
        return LEVEL_SEVERITY[level] >= FILTER_THRESHOLD[directive.level]
      }
    }

    return false
  }

  matches(record: Pick<LogRecord, "level" | "target" | "message">): boolean {
    if (!this.enabled(record.level, record.target)) return false

    return this.regex ? this.regex.test(record.message) : true
  }

  /** The most verbose level any directive lets through. */
  maxLevel(): LevelFilterName {
    let min = Number.POSITIVE_INFINITY

    for (const d of this.directives) {
      min = Math.min(min, FILTER_THRESHOLD[d.level])
    }

    return logLevelNames.find((name) => LEVEL_SEVERITY[name] === min) ?? "off"
  }

  /** Directives in evaluation order (least to most specific). */
  list(): readonly FilterDirective[] {
    return this.directives
  }
}
