import fs from "node:fs/promises"
import fsSync from "node:fs"
import os from "node:os"
import path from "node:path"
import { WriteFailedError } from "../../../errors/errors"
import { DestinationWriter } from "../destination-writer"
import { MemoryWriter } from "../memory-writer"

describe("DestinationWriter behavior", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ecslog-writer-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("creates missing parent directories", async () => {
    const file = path.join(dir, "nested", "deeper", "app.log")
    const writer = new DestinationWriter({ file })

    writer.writeLine("hello")
    writer.close()

    expect(await fs.readFile(file, "utf8")).toBe("hello\n")
  })

  it("appends to an existing file", async () => {
    const file = path.join(dir, "app.log")
    await fs.writeFile(file, "existing\n")

    const writer = new DestinationWriter({ file })
    writer.writeLine("appended")
    writer.close()

    expect(await fs.readFile(file, "utf8")).toBe("existing\nappended\n")
  })

  it("drops a line that failed to write", async () => {
    const file = path.join(dir, "app.log")
    const writer = new DestinationWriter({ file })
    vi.spyOn(fsSync, "writeSync").mockImplementationOnce(() => {
      throw Object.assign(new Error("ENOSPC: no space left on device"), { code: "ENOSPC" })
    })

    expect(() => writer.writeLine("A")).toThrow(WriteFailedError)
    writer.writeLine("B")
    writer.close()

    expect(await fs.readFile(file, "utf8")).toBe("B\n")
  })

  it("keeps failing lines out of later writes under repeated failure", async () => {
    const file = path.join(dir, "app.log")
    const writer = new DestinationWriter({ file })
    const enospc = () => {
      throw Object.assign(new Error("ENOSPC: no space left on device"), { code: "ENOSPC" })
    }
    vi.spyOn(fsSync, "writeSync")
      .mockImplementationOnce(enospc)
      .mockImplementationOnce(enospc)
      .mockImplementationOnce(enospc)

    for (const line of ["A", "B", "C"]) {
      expect(() => writer.writeLine(line)).toThrow(WriteFailedError)
    }
    writer.writeLine("D")
    writer.writeLine("E")
    writer.close()

    expect(await fs.readFile(file, "utf8")).toBe("D\nE\n")
  })

  it("reports the stream error as the cause", () => {
    const writer = new DestinationWriter({ file: path.join(dir, "app.log") })
    const cause = Object.assign(new Error("EIO: i/o error, write"), { code: "EIO" })
    vi.spyOn(fsSync, "writeSync").mockImplementationOnce(() => {
      throw cause
    })

    let caught: unknown
    try {
      writer.writeLine("A")
    } catch (err) {
      caught = err
    }
    writer.close()

    expect(caught).toBeInstanceOf(WriteFailedError)
    if (caught instanceof WriteFailedError) expect(caught.cause).toBe(cause)
  })

  it("rejects writes after close", () => {
    const writer = new DestinationWriter({ file: path.join(dir, "app.log") })
    writer.close()

    expect(() => writer.writeLine("late")).toThrow(WriteFailedError)
  })

  it("close() is idempotent", () => {
    const writer = new DestinationWriter({ file: path.join(dir, "app.log") })

    writer.close()

    expect(() => writer.close()).not.toThrow()
  })

  it("fails to open a destination that is a directory", () => {
    expect(() => new DestinationWriter({ file: dir })).toThrow(WriteFailedError)
  })

  it("defaults to stderr", () => {
    const writer = new DestinationWriter()

    expect(writer.target).toBe("stderr")
  })
})

describe("MemoryWriter behavior", () => {
  it("read() returns a copy of the lines", () => {
    const writer = new MemoryWriter()
    writer.writeLine("a")

    const lines = writer.read()
    lines.push("b")

    expect(writer.read()).toEqual(["a"])
  })

  it("clear() drops everything written so far", () => {
    const writer = new MemoryWriter()
    writer.writeLine("a")

    writer.clear()

    expect(writer.read()).toEqual([])
    expect(writer.text()).toBe("")
  })
})
