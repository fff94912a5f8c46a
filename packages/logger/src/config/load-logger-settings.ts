import { z } from "zod/mini"
import { LoggerConfigError } from "../errors/errors"
import { EnvSource } from "./env-source"
import { type EnvConfig, envSchema, type LoggerSettings } from "./schema"

export const ENV_PREFIX = "ECS_LOG"

export type LoadLoggerSettingsOptions = {
  env?: Record<string, string | undefined>
  /** Explicit settings; each one wins over its environment variable. */
  overrides?: Partial<LoggerSettings>
}

export function mapEnvToSettings(env: EnvConfig): LoggerSettings {
  return {
    filter: env.ECS_LOG,
    writer: env.ECS_LOG_WRITER,
    captureCallSite: env.ECS_LOG_CALL_SITE,
    ...(env.ECS_LOG_FILE !== undefined && { file: env.ECS_LOG_FILE }),
  }
}

/**
 * Resolve logger settings from `ECS_LOG*` environment variables and explicit
 * overrides.
 *
 * @example
 * ```ts
 * // ECS_LOG="info,db=trace" ECS_LOG_WRITER=stdout
 * loadLoggerSettings()
 * // { filter: "info,db=trace", writer: "stdout", captureCallSite: false }
 * ```
 *
 * @throws LoggerConfigError when a variable fails validation, or a file
 * writer is selected without a path.
 */
export function loadLoggerSettings(options: LoadLoggerSettingsOptions = {}): LoggerSettings {
  const raw = new EnvSource({ env: options.env ?? process.env, prefix: ENV_PREFIX }).load()
  const result = envSchema.safeParse(raw)

  if (!result.success) {
    throw new LoggerConfigError(
      `Logger configuration validation failed:\n${z.prettifyError(result.error)}`,
      result.error,
    )
  }

  const fromEnv = mapEnvToSettings(result.data)
  const overrides = options.overrides ?? {}
  const file = overrides.file ?? fromEnv.file

  const settings: LoggerSettings = {
    filter: overrides.filter ?? fromEnv.filter,
    writer: overrides.writer ?? fromEnv.writer,
    captureCallSite: overrides.captureCallSite ?? fromEnv.captureCallSite,
    ...(file !== undefined && { file }),
  }

  if (settings.writer === "file" && settings.file === undefined) {
    throw new LoggerConfigError(`${ENV_PREFIX}_FILE is required when the writer is "file"`)
  }

  return settings
}
