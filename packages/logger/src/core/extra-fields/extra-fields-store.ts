import type { JsonObject } from "../../ports/json"
import { toJsonObject } from "./to-json-object"

/**
 * Holds at most one extra-fields payload shared by every logger that
 * references the store.
 *
 * @remarks
 * The payload is converted to a frozen JSON object when it is set, so a
 * snapshot is an immutable value and replacing it is a single reference
 * swap. Every operation runs to completion synchronously; a reader sees
 * either the previous payload or the new one, never a mix of both.
 *
 * Conversion errors surface from `set()` (eager policy) and leave the
 * current payload in place.
 */
export class ExtraFieldsStore {
  private current: JsonObject | undefined

  /**
   * Replace the payload.
   *
   * @throws SerializationUnsupportedError when `payload` does not serialize
   * to a JSON object. The store is left unchanged.
   */
  set(payload: object): void {
    this.current = toJsonObject(payload)
  }

  /** Drop the payload. Idempotent. */
  clear(): void {
    this.current = undefined
  }

  /** The current payload; the same frozen reference until the next `set` or `clear`. */
  snapshot(): JsonObject | undefined {
    return this.current
  }

  isEmpty(): boolean {
    return this.current === undefined
  }
}

/** Process-wide store used by loggers that are not given one explicitly. */
export const defaultExtraFieldsStore = new ExtraFieldsStore()

/**
 * Merge `payload`'s fields into every subsequent log line of loggers using
 * the default store, until cleared or replaced.
 *
 * @example
 * ```ts
 * setExtraFields({ service: { name: "billing" }, deployment: "blue" })
 * ```
 *
 * @throws SerializationUnsupportedError when `payload` does not serialize
 * to a JSON object; the previous extra fields stay in place.
 */
export function setExtraFields(payload: object): void {
  defaultExtraFieldsStore.set(payload)
}

export function clearExtraFields(): void {
  defaultExtraFieldsStore.clear()
}
