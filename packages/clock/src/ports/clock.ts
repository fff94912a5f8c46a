import type { EpochNanos, Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Dates stop at millisecond precision; prefer `nowNs()` for log timestamps.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds

  /** Current time as nanoseconds since Unix epoch. */
  nowNs(): EpochNanos
}

export type Clock = TimeSource
