import type { Clock } from "../ports/clock"
import { type EpochNanos, type Milliseconds, NANOS_PER_MILLI } from "../ports/time"

/**
 * Wall clock with nanosecond resolution.
 *
 * Every reading takes the current `Date.now()`, so clock steps and suspends
 * show up immediately. Digits below the millisecond come from the monotonic
 * `process.hrtime` counter.
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  nowNs(): EpochNanos {
    const subMilli = process.hrtime.bigint() % NANOS_PER_MILLI

    return BigInt(Date.now()) * NANOS_PER_MILLI + subMilli
  }
}
