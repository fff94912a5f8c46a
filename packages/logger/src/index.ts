export {
  createEcsLogger,
  EcsLogger,
  type EcsLoggerDeps,
} from "./adapters/ecs/ecs-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export {
  type DestinationTarget,
  DestinationWriter,
} from "./adapters/writers/destination-writer"
export { MemoryWriter } from "./adapters/writers/memory-writer"
export {
  type LoadLoggerSettingsOptions,
  loadLoggerSettings,
} from "./config/load-logger-settings"
export type { LoggerSettings, WriterKind } from "./config/schema"
export { type CallSite, captureCallSite, parseCallSite } from "./core/call-site"
export { EcsFormatter, type EcsFormatterDeps } from "./core/ecs/ecs-formatter"
export {
  ECS_VERSION,
  type EcsEvent,
  type EcsLevel,
  RESERVED_FIELDS,
  toEcsEvent,
} from "./core/ecs/ecs-event"
export { formatEcsLine } from "./core/ecs/format-ecs-line"
export {
  clearExtraFields,
  defaultExtraFieldsStore,
  ExtraFieldsStore,
  setExtraFields,
} from "./core/extra-fields/extra-fields-store"
export { type ParsedFilterSpec, parseFilterSpec } from "./core/filter/filter-spec"
export { type FilterDirective, LogFilter } from "./core/filter/log-filter"
export {
  FILTER_WARNING_TARGET,
  getLogger,
  type InitOptions,
  type InitResult,
  init,
  tryInit,
} from "./core/init"
export {
  LoggerAlreadyInitializedError,
  LoggerConfigError,
  type SerializationFailureReason,
  SerializationUnsupportedError,
  WriteFailedError,
} from "./errors/errors"
export {
  type ErrorContext,
  isLoggerError,
  LoggerError,
  type LoggerErrorCode,
  type SerializedLoggerError,
  serializeLoggerError,
} from "./errors/logger-error"
export type { JsonObject, JsonPrimitive, JsonValue } from "./ports/json"
export {
  type LevelFilterName,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  levelFilterNames,
  logLevelNames,
} from "./ports/log-level"
export type { LogBindings, LogOrigin, LogRecord } from "./ports/log-record"
export type { LogWriter } from "./ports/log-writer"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
