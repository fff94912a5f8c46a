import { type EcsLogger, type EcsLoggerDeps, createEcsLogger } from "../adapters/ecs/ecs-logger"
import { NullLogger } from "../adapters/null/null-logger"
import { DestinationWriter } from "../adapters/writers/destination-writer"
import { type LoadLoggerSettingsOptions, loadLoggerSettings } from "../config/load-logger-settings"
import type { LoggerSettings } from "../config/schema"
import { LoggerAlreadyInitializedError } from "../errors/errors"
import type { LogWriter } from "../ports/log-writer"
import type { Logger } from "../ports/logger"

/** Target of the records reporting ignored filter directives. */
export const FILTER_WARNING_TARGET = "ecslog.filter"

export type InitOptions = LoadLoggerSettingsOptions & {
  deps?: EcsLoggerDeps
}

export type InitResult =
  | { readonly kind: "installed"; readonly logger: EcsLogger }
  | { readonly kind: "already_initialized"; readonly error: LoggerAlreadyInitializedError }

const nullLogger = new NullLogger()
let installed: EcsLogger | undefined

export function createWriter(settings: LoggerSettings): LogWriter {
  if (settings.writer === "file" && settings.file !== undefined) {
    return new DestinationWriter({ file: settings.file })
  }

  return new DestinationWriter(settings.writer === "stdout" ? "stdout" : "stderr")
}

/**
 * Install the process-wide logger, configured from `ECS_LOG*` variables.
 *
 * Ignored filter directives are reported as `warn` records with target
 * `ecslog.filter`, whatever the configured filter.
 *
 * @throws LoggerConfigError when the configuration is invalid.
 */
export function tryInit(options: InitOptions = {}): InitResult {
  if (installed) {
    return { kind: "already_initialized", error: new LoggerAlreadyInitializedError() }
  }

  const settings = loadLoggerSettings(options)
  const deps: EcsLoggerDeps = {
    ...options.deps,
    writer: options.deps?.writer ?? createWriter(settings),
  }

  const logger = createEcsLogger(deps, {
    filter: settings.filter,
    captureCallSite: settings.captureCallSite,
  })

  if (logger.filterWarnings.length > 0) {
    const reporter = createEcsLogger(deps, { filter: "warn", target: FILTER_WARNING_TARGET })

    for (const warning of logger.filterWarnings) reporter.warn(warning)
  }

  installed = logger

  return { kind: "installed", logger }
}

/**
 * Like {@link tryInit}, but a second install is an error.
 *
 * @throws LoggerAlreadyInitializedError when a logger is already installed.
 */
export function init(options: InitOptions = {}): EcsLogger {
  const result = tryInit(options)

  if (result.kind === "already_initialized") throw result.error

  return result.logger
}

/** The installed logger, or a no-op logger before initialization. */
export function getLogger(): Logger {
  return installed ?? nullLogger
}
