import type { JsonObject } from "../../ports/json"
import type { LogRecord } from "../../ports/log-record"
import { RESERVED_FIELDS, toEcsEvent } from "./ecs-event"

/**
 * Serialize the extra fields that survive the reserved-name check as a
 * comma-prefixed list of `"key":value` members, in payload order.
 */
export function serializeExtraMembers(extra: JsonObject): string {
  let out = ""

  for (const [key, value] of Object.entries(extra)) {
    if (RESERVED_FIELDS.has(key)) continue
    out += `,${JSON.stringify(key)}:${JSON.stringify(value)}`
  }

  return out
}

/**
 * Render one record as a single-line ECS JSON document.
 *
 * Fixed fields come first, in a stable order, followed by the extra fields.
 * The document is assembled as text so that integer-like extra keys cannot
 * be hoisted ahead of the fixed fields.
 */
export function formatEcsLine(record: LogRecord, extra?: JsonObject): string {
  const fixed = JSON.stringify(toEcsEvent(record))
  if (!extra) return fixed

  return `${fixed.slice(0, -1)}${serializeExtraMembers(extra)}}`
}
