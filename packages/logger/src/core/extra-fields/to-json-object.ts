import { errWithCause } from "pino-std-serializers"
import { SerializationUnsupportedError } from "../../errors/errors"
import type { JsonObject, JsonValue } from "../../ports/json"

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function errorReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? errWithCause(value) : value
}

function deepFreeze<T extends JsonValue>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

function parseJson(text: string): JsonValue {
  return JSON.parse(text)
}

/**
 * Convert an arbitrary payload into a frozen, detached JSON object.
 *
 * Follows `JSON.stringify` semantics (`toJSON` is honoured, `undefined`,
 * functions and symbols are dropped). `Error` values are rendered with
 * `errWithCause` so their message, stack and cause survive.
 *
 * @throws SerializationUnsupportedError when the payload cannot be
 * stringified, or does not stringify to an object.
 */
export function toJsonObject(payload: unknown): JsonObject {
  let text: string | undefined

  try {
    text = JSON.stringify(payload, errorReplacer)
  } catch (err) {
    throw new SerializationUnsupportedError("invalid_json", err)
  }

  if (text === undefined) throw new SerializationUnsupportedError("not_object")

  const value = parseJson(text)
  if (!isJsonObject(value)) throw new SerializationUnsupportedError("not_object")

  return deepFreeze(value)
}
