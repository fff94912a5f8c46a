import { type Clock, SystemClock } from "@ecslog/clock"
import { captureCallSite } from "../../core/call-site"
import { EcsFormatter } from "../../core/ecs/ecs-formatter"
import {
  defaultExtraFieldsStore,
  type ExtraFieldsStore,
} from "../../core/extra-fields/extra-fields-store"
import { parseFilterSpec } from "../../core/filter/filter-spec"
import type { LogFilter } from "../../core/filter/log-filter"
import type { LogLevelName } from "../../ports/log-level"
import type { LogBindings, LogOrigin, LogRecord } from "../../ports/log-record"
import type { LogWriter } from "../../ports/log-writer"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import { DestinationWriter } from "../writers/destination-writer"

export type EcsLoggerDeps = {
  /** Destination for formatted lines. Defaults to stderr. */
  writer?: LogWriter
  /** Extra-fields store merged into every line. Defaults to the process-wide store. */
  store?: ExtraFieldsStore
  clock?: Clock
}

/** State a logger shares with all of its children. */
export type SharedState = {
  readonly writer: LogWriter
  readonly formatter: EcsFormatter
  readonly clock: Clock
  readonly filter: LogFilter
  readonly filterWarnings: readonly string[]
  readonly opts: LoggerOptions
}

const DEFAULT_OPTIONS: LoggerOptions = {
  filter: "error",
  target: "root",
  captureCallSite: false,
}

function createSharedState(deps: EcsLoggerDeps, opts: Partial<LoggerOptions>): SharedState {
  const resolved: LoggerOptions = {
    filter: opts.filter ?? DEFAULT_OPTIONS.filter,
    target: opts.target ?? DEFAULT_OPTIONS.target,
    captureCallSite: opts.captureCallSite ?? DEFAULT_OPTIONS.captureCallSite,
  }
  const { filter, warnings } = parseFilterSpec(resolved.filter)

  return {
    writer: deps.writer ?? new DestinationWriter("stderr"),
    formatter: new EcsFormatter({ store: deps.store ?? defaultExtraFieldsStore }),
    clock: deps.clock ?? new SystemClock(),
    filter,
    filterWarnings: warnings,
    opts: resolved,
  }
}

function mergeBindings(base: LogBindings, patch: LogBindings): LogBindings {
  const target = patch.target ?? base.target
  const modulePath = patch.modulePath ?? base.modulePath

  return {
    ...(target !== undefined && { target }),
    ...(modulePath !== undefined && { modulePath }),
  }
}

/**
 * Logger that renders every accepted record as one ECS JSON line.
 *
 * @remarks
 * Calls are synchronous. A record that passes the filter is formatted with
 * the current extra fields and written before the call returns; a writer
 * failure is rethrown as `WriteFailedError` from the logging call.
 */
export class EcsLogger implements Logger {
  private readonly shared: SharedState
  private readonly bindings: LogBindings

  constructor(
    deps: EcsLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogBindings = {},
    shared?: SharedState,
  ) {
    this.shared = shared ?? createSharedState(deps, opts)
    this.bindings = mergeBindings({}, bindings)
  }

  /** Parts of the filter spec that were ignored while parsing it. */
  get filterWarnings(): readonly string[] {
    return this.shared.filterWarnings
  }

  child(bindings: LogBindings): Logger {
    return new EcsLogger({}, {}, mergeBindings(this.bindings, bindings), this.shared)
  }

  trace(message: string, origin?: LogOrigin): void {
    this.emit("trace", message, origin, this.trace)
  }

  debug(message: string, origin?: LogOrigin): void {
    this.emit("debug", message, origin, this.debug)
  }

  info(message: string, origin?: LogOrigin): void {
    this.emit("info", message, origin, this.info)
  }

  warn(message: string, origin?: LogOrigin): void {
    this.emit("warn", message, origin, this.warn)
  }

  error(message: string, origin?: LogOrigin): void {
    this.emit("error", message, origin, this.error)
  }

  log(level: LogLevelName, message: string, origin?: LogOrigin): void {
    this.emit(level, message, origin, this.log)
  }

  enabled(level: LogLevelName, target?: string): boolean {
    return this.shared.filter.enabled(level, target ?? this.resolveTarget())
  }

  private resolveTarget(origin?: LogOrigin): string {
    return origin?.target ?? this.bindings.target ?? this.shared.opts.target
  }

  private emit(
    level: LogLevelName,
    message: string,
    origin: LogOrigin | undefined,
    boundary: (...args: never[]) => unknown,
  ): void {
    const target = this.resolveTarget(origin)

    if (!this.shared.filter.matches({ level, target, message })) return

    const wantsSite =
      this.shared.opts.captureCallSite &&
      origin?.filePath === undefined &&
      origin?.line === undefined
    const site = wantsSite ? captureCallSite(boundary) : undefined

    const modulePath = origin?.modulePath ?? this.bindings.modulePath
    const filePath = origin?.filePath ?? site?.filePath
    const line = origin?.line ?? site?.line

    const record: LogRecord = {
      timestamp: this.shared.clock.nowNs(),
      level,
      message,
      target,
      ...(modulePath !== undefined && { modulePath }),
      ...(filePath !== undefined && { filePath }),
      ...(line !== undefined && { line }),
    }

    this.shared.formatter.write(record, this.shared.writer)
  }
}

export function createEcsLogger(
  deps: EcsLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): EcsLogger {
  return new EcsLogger(deps, opts)
}
