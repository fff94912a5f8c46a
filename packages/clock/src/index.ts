export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { formatRfc3339Nanos, parseRfc3339Nanos } from "./core/rfc3339"
export type { Clock, TimeSource } from "./ports/clock"
export type * from "./ports/time"
