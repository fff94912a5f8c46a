import path from "node:path"
import { formatRfc3339Nanos } from "@ecslog/clock"
import type { LogLevelName } from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"

/** ECS schema version the emitted documents follow. */
export const ECS_VERSION = "1.12.1"

/**
 * Top-level fields owned by the formatter. Extra fields with one of these
 * names are dropped.
 */
export const RESERVED_FIELDS: ReadonlySet<string> = new Set([
  "@timestamp",
  "log.level",
  "message",
  "ecs.version",
  "log.origin",
])

const ECS_LEVEL: Record<LogLevelName, EcsLevel> = {
  trace: "TRACE",
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
}

export type EcsLevel = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR"

export type EcsLogOrigin = {
  file: {
    line?: number
    name?: string
  }
  node: {
    target: string
    module_path?: string
    file_path?: string
  }
}

/**
 * The fixed part of an ECS log document, in emission order.
 *
 * See https://github.com/elastic/ecs-logging/tree/main/spec
 */
export type EcsEvent = {
  "@timestamp": string
  "log.level": EcsLevel
  message: string
  "ecs.version": typeof ECS_VERSION
  "log.origin": EcsLogOrigin
}

function fileName(filePath: string): string | undefined {
  const name = path.basename(filePath)

  return name === "" || name === "." || name === ".." ? undefined : name
}

export function toEcsEvent(record: LogRecord): EcsEvent {
  const name = record.filePath !== undefined ? fileName(record.filePath) : undefined

  return {
    "@timestamp": formatRfc3339Nanos(record.timestamp),
    "log.level": ECS_LEVEL[record.level],
    message: record.message,
    "ecs.version": ECS_VERSION,
    "log.origin": {
      file: {
        ...(record.line !== undefined && { line: record.line }),
        ...(name !== undefined && { name }),
      },
      node: {
        target: record.target,
        ...(record.modulePath !== undefined && { module_path: record.modulePath }),
        ...(record.filePath !== undefined && { file_path: record.filePath }),
      },
    },
  }
}
