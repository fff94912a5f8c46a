import { SerializationUnsupportedError } from "../../../errors/errors"
import {
  clearExtraFields,
  defaultExtraFieldsStore,
  ExtraFieldsStore,
  setExtraFields,
} from "../extra-fields-store"

function captureError(fn: () => void): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

describe("ExtraFieldsStore", () => {
  let store: ExtraFieldsStore

  beforeEach(() => {
    store = new ExtraFieldsStore()
  })

  it("starts empty", () => {
    expect(store.isEmpty()).toBe(true)
    expect(store.snapshot()).toBeUndefined()
  })

  it("holds the last payload set", () => {
    store.set({ a: 1 })
    store.set({ b: { c: [1, "two", null, true] } })

    expect(store.isEmpty()).toBe(false)
    expect(store.snapshot()).toEqual({ b: { c: [1, "two", null, true] } })
  })

  it("returns the same snapshot until the payload changes", () => {
    store.set({ a: 1 })
    const first = store.snapshot()

    expect(store.snapshot()).toBe(first)

    store.set({ a: 1 })
    expect(store.snapshot()).not.toBe(first)
  })

  it("clear() is idempotent", () => {
    store.clear()
    store.set({ a: 1 })
    store.clear()
    store.clear()

    expect(store.isEmpty()).toBe(true)
  })

  it("detaches the payload from the caller's object", () => {
    const payload = { user: { id: "u-1" }, roles: ["admin"] }
    store.set(payload)

    payload.user.id = "u-2"
    payload.roles.push("root")

    expect(store.snapshot()).toEqual({ user: { id: "u-1" }, roles: ["admin"] })
  })

  it("freezes the snapshot deeply", () => {
    store.set({ user: { id: "u-1" }, roles: ["admin"] })
    const snapshot = store.snapshot()

    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.isFrozen(snapshot?.user)).toBe(true)
    expect(Object.isFrozen(snapshot?.roles)).toBe(true)
  })

  it("follows JSON.stringify conversion rules", () => {
    store.set({
      when: new Date(0),
      skipped: undefined,
      fn: () => 1,
      money: { toJSON: () => "12.50 EUR" },
      kept: 0,
    })

    expect(store.snapshot()).toEqual({
      when: "1970-01-01T00:00:00.000Z",
      money: "12.50 EUR",
      kept: 0,
    })
  })

  it("renders errors with their message, stack and cause", () => {
    store.set({ err: new TypeError("outer", { cause: new Error("inner") }) })

    const err = store.snapshot()?.err

    expect(err).toMatchObject({
      type: "TypeError",
      message: "outer",
      stack: expect.stringContaining("TypeError: outer"),
      cause: { type: "Error", message: "inner" },
    })
  })

  describe("rejected payloads", () => {
    it("rejects an array and keeps the previous payload", () => {
      store.set({ keep: "me" })
      const before = store.snapshot()

      const err = captureError(() => store.set(["not", "an", "object"]))

      expect(err).toBeInstanceOf(SerializationUnsupportedError)
      if (err instanceof SerializationUnsupportedError) {
        expect(err.reason).toBe("not_object")
        expect(err.code).toBe("serialization_unsupported")
        expect(err.context).toEqual({ reason: "not_object" })
        expect(err.message).toBe("the data cannot be converted into a JSON object")
      }
      expect(store.snapshot()).toBe(before)
    })

    it("rejects an object whose toJSON returns a scalar", () => {
      const err = captureError(() => store.set({ toJSON: () => 42 }))

      expect(err).toBeInstanceOf(SerializationUnsupportedError)
      expect(store.isEmpty()).toBe(true)
    })

    it("rejects a circular payload as invalid JSON", () => {
      const payload: Record<string, unknown> = { name: "loop" }
      payload.self = payload

      const err = captureError(() => store.set(payload))

      expect(err).toBeInstanceOf(SerializationUnsupportedError)
      if (err instanceof SerializationUnsupportedError) {
        expect(err.reason).toBe("invalid_json")
        expect(err.message).toBe("the data cannot be converted into JSON")
        expect(err.cause).toBeInstanceOf(TypeError)
      }
      expect(store.isEmpty()).toBe(true)
    })

    it("rejects BigInt values as invalid JSON", () => {
      const err = captureError(() => store.set({ big: 10n }))

      expect(err).toBeInstanceOf(SerializationUnsupportedError)
      if (err instanceof SerializationUnsupportedError) {
        expect(err.reason).toBe("invalid_json")
      }
    })
  })
})

describe("process-wide extra fields", () => {
  afterEach(() => {
    clearExtraFields()
  })

  it("setExtraFields() and clearExtraFields() act on the default store", () => {
    setExtraFields({ deployment: "blue" })
    expect(defaultExtraFieldsStore.snapshot()).toEqual({ deployment: "blue" })

    clearExtraFields()
    expect(defaultExtraFieldsStore.isEmpty()).toBe(true)
  })
})
