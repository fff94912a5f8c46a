import { LoggerConfigError } from "../../errors/errors"
import { EnvSource } from "../env-source"
import { loadLoggerSettings } from "../load-logger-settings"

function captureError(fn: () => void): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

describe("loadLoggerSettings", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadLoggerSettings({ env: {} })).toEqual({
      filter: "",
      writer: "stderr",
      captureCallSite: false,
    })
  })

  it("reads every ECS_LOG variable", () => {
    const settings = loadLoggerSettings({
      env: {
        ECS_LOG: "info,db=trace",
        ECS_LOG_WRITER: "file",
        ECS_LOG_FILE: "/var/log/app.log",
        ECS_LOG_CALL_SITE: "true",
      },
    })

    expect(settings).toEqual({
      filter: "info,db=trace",
      writer: "file",
      file: "/var/log/app.log",
      captureCallSite: true,
    })
  })

  it.each([
    ["1", true],
    ["yes", true],
    ["on", true],
    ["0", false],
    ["false", false],
  ])("parses ECS_LOG_CALL_SITE=%s", (value, expected) => {
    expect(loadLoggerSettings({ env: { ECS_LOG_CALL_SITE: value } }).captureCallSite).toBe(expected)
  })

  it("ignores unrelated variables", () => {
    expect(loadLoggerSettings({ env: { LOG_LEVEL: "debug", PATH: "/usr/bin" } }).filter).toBe("")
  })

  it("lets overrides win over the environment", () => {
    const settings = loadLoggerSettings({
      env: { ECS_LOG: "info", ECS_LOG_WRITER: "stdout" },
      overrides: { filter: "debug", writer: "file", file: "app.log" },
    })

    expect(settings).toEqual({
      filter: "debug",
      writer: "file",
      file: "app.log",
      captureCallSite: false,
    })
  })

  it("rejects an unknown writer", () => {
    const err = captureError(() => loadLoggerSettings({ env: { ECS_LOG_WRITER: "syslog" } }))

    expect(err).toBeInstanceOf(LoggerConfigError)
    if (err instanceof LoggerConfigError) {
      expect(err.code).toBe("invalid_config")
      expect(err.message).toMatch(/^Logger configuration validation failed:\n/)
      expect(err.message).toContain("ECS_LOG_WRITER")
    }
  })

  it("rejects a value that is not a boolean", () => {
    expect(() => loadLoggerSettings({ env: { ECS_LOG_CALL_SITE: "maybe" } })).toThrow(
      LoggerConfigError,
    )
  })

  it("rejects an empty file path", () => {
    expect(() =>
      loadLoggerSettings({ env: { ECS_LOG_WRITER: "file", ECS_LOG_FILE: "" } }),
    ).toThrow(LoggerConfigError)
  })

  it("requires a path for the file writer", () => {
    expect(() => loadLoggerSettings({ env: { ECS_LOG_WRITER: "file" } })).toThrow(
      'ECS_LOG_FILE is required when the writer is "file"',
    )
  })
})

describe("EnvSource", () => {
  it("keeps prefixed variables with their full names", () => {
    const source = new EnvSource({
      prefix: "ECS_LOG",
      env: { ECS_LOG: "info", ECS_LOG_WRITER: "stdout", HOME: "/root", ECS_LOG_FILE: undefined },
    })

    expect(source.load()).toEqual({ ECS_LOG: "info", ECS_LOG_WRITER: "stdout" })
  })

  it("reads everything without a prefix", () => {
    expect(new EnvSource({ env: { A: "1", B: "2" } }).load()).toEqual({ A: "1", B: "2" })
  })
})
