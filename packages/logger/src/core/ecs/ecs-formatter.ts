import { WriteFailedError } from "../../errors/errors"
import type { JsonObject } from "../../ports/json"
import type { LogRecord } from "../../ports/log-record"
import type { LogWriter } from "../../ports/log-writer"
import { defaultExtraFieldsStore, type ExtraFieldsStore } from "../extra-fields/extra-fields-store"
import { serializeExtraMembers } from "./format-ecs-line"
import { toEcsEvent } from "./ecs-event"

export type EcsFormatterDeps = {
  store?: ExtraFieldsStore
}

/**
 * Formats records against the current contents of an extra-fields store.
 *
 * The store is read once per record. Serialized extra fields are cached per
 * snapshot, so an unchanged payload is only stringified once.
 */
export class EcsFormatter {
  private readonly store: ExtraFieldsStore
  private readonly extraCache = new WeakMap<JsonObject, string>()

  constructor(deps: EcsFormatterDeps = {}) {
    this.store = deps.store ?? defaultExtraFieldsStore
  }

  format(record: LogRecord): string {
    const fixed = JSON.stringify(toEcsEvent(record))
    const extra = this.store.snapshot()
    if (!extra) return fixed

    const members = this.extraMembers(extra)

    return members === "" ? fixed : `${fixed.slice(0, -1)}${members}}`
  }

  /**
   * Format `record` and hand it to `writer`.
   *
   * @throws WriteFailedError when the writer rejects the line.
   */
  write(record: LogRecord, writer: LogWriter): void {
    const line = this.format(record)

    try {
      writer.writeLine(line)
    } catch (err) {
      if (err instanceof WriteFailedError) throw err
      throw new WriteFailedError("failed to write log line", err)
    }
  }

  private extraMembers(extra: JsonObject): string {
    const cached = this.extraCache.get(extra)
    if (cached !== undefined) return cached

    const members = serializeExtraMembers(extra)
    this.extraCache.set(extra, members)

    return members
  }
}
