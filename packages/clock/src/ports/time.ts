export type Milliseconds = number

/** A duration in nanoseconds. */
export type Nanoseconds = bigint

/** Nanoseconds since the Unix epoch (1970-01-01T00:00:00Z). */
export type EpochNanos = bigint

export const NANOS_PER_MILLI = 1_000_000n
export const NANOS_PER_SECOND = 1_000_000_000n
