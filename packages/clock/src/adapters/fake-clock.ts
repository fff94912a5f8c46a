import type { Clock } from "../ports/clock"
import { type EpochNanos, type Milliseconds, NANOS_PER_MILLI, type Nanoseconds } from "../ports/time"

export class FakeClock implements Clock {
  private time: EpochNanos

  constructor(start: EpochNanos = 0n) {
    this.time = start
  }

  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): Milliseconds {
    return Number(this.time / NANOS_PER_MILLI)
  }

  nowNs(): EpochNanos {
    return this.time
  }

  advance(ns: Nanoseconds): void {
    this.time = this.time + ns
  }

  set(ns: EpochNanos): void {
    this.time = ns
  }
}
