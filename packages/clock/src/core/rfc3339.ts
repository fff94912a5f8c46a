import { type EpochNanos, NANOS_PER_MILLI, NANOS_PER_SECOND } from "../ports/time"

const RFC3339_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[Tt](\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?([Zz]|[+-]\d{2}:\d{2})$/

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b
  return a % b < 0n ? q - 1n : q
}

/** 0000-01-01T00:00:00Z and 9999-12-31T23:59:59.999999999Z, the four-digit-year range. */
const MIN_NS: EpochNanos = -62_167_219_200n * NANOS_PER_SECOND
const MAX_NS: EpochNanos = 253_402_300_800n * NANOS_PER_SECOND - 1n

/**
 * Render an instant as RFC 3339 in UTC with a nine-digit fraction.
 *
 * Instants outside years 0000 to 9999 are clamped to the nearest end of
 * that range.
 *
 * @example
 * ```ts
 * formatRfc3339Nanos(1680254706576136800n) // "2023-03-31T09:25:06.576136800Z"
 * ```
 */
export function formatRfc3339Nanos(instant: EpochNanos): string {
  const ns = instant < MIN_NS ? MIN_NS : instant > MAX_NS ? MAX_NS : instant
  const seconds = floorDiv(ns, NANOS_PER_SECOND)
  const fraction = ns - seconds * NANOS_PER_SECOND

  const whole = new Date(Number(seconds) * 1000).toISOString().slice(0, 19)

  return `${whole}.${fraction.toString().padStart(9, "0")}Z`
}

/**
 * Parse an RFC 3339 timestamp (any offset, up to nanosecond precision) into
 * nanoseconds since the epoch.
 *
 * @returns `undefined` when the text is not a valid RFC 3339 timestamp.
 */
export function parseRfc3339Nanos(text: string): EpochNanos | undefined {
  const match = RFC3339_PATTERN.exec(text)
  if (!match) return undefined

  const [, date, time, fraction = "", offset = "Z"] = match
  const ms = Date.parse(`${date}T${time}${offset.toUpperCase()}`)
  if (!Number.isFinite(ms)) return undefined

  return BigInt(ms) * NANOS_PER_MILLI + BigInt(fraction.padEnd(9, "0"))
}
