import pino from "pino"
import { WriteFailedError } from "../../errors/errors"
import type { LogWriter } from "../../ports/log-writer"

export type DestinationTarget = "stdout" | "stderr" | { file: string }

type Destination = ReturnType<typeof pino.destination>

function label(target: DestinationTarget): string {
  return typeof target === "string" ? target : target.file
}

function openDestination(target: DestinationTarget): Destination {
  if (target === "stdout") return pino.destination({ dest: 1, sync: true })
  if (target === "stderr") return pino.destination({ dest: 2, sync: true })

  return pino.destination({ dest: target.file, sync: true, mkdir: true, append: true })
}

/**
 * Writes lines synchronously to stdout, stderr or a file through pino's
 * sonic-boom destination.
 *
 * @remarks
 * Nothing is buffered: each `writeLine` issues one `write(2)`, and a failure
 * surfaces as `WriteFailedError` from that call. A failed stream is dropped
 * together with whatever it still holds, and the next line goes to a freshly
 * opened destination.
 */
export class DestinationWriter implements LogWriter {
  private stream: Destination | undefined
  private readonly failures: unknown[] = []
  private closed = false

  constructor(readonly target: DestinationTarget = "stderr") {
    this.stream = this.open()
  }

  writeLine(line: string): void {
    if (this.closed) {
      throw new WriteFailedError(`log destination ${label(this.target)} is closed`)
    }

    this.stream ??= this.open()
    const stream = this.stream

    try {
      stream.write(`${line}\n`)
    } catch (err) {
      this.failures.unshift(err)
    }

    const failure = this.failures.shift()
    this.failures.length = 0

    if (failure !== undefined) {
      this.discard(stream)
      throw new WriteFailedError(`failed to write to ${label(this.target)}`, failure)
    }
  }

  /** Release the underlying descriptor. stdout and stderr stay open. */
  close(): void {
    if (this.closed) return
    this.closed = true

    if (this.stream) this.discard(this.stream)
  }

  private open(): Destination {
    let stream: Destination

    try {
      stream = openDestination(this.target)
    } catch (err) {
      throw new WriteFailedError(`cannot open log destination ${label(this.target)}`, err)
    }

    // Errors from a stream that has been discarded no longer concern any caller.
    stream.on("error", (err: unknown) => {
      if (stream === this.stream) this.failures.push(err)
    })

    return stream
  }

  private discard(stream: Destination): void {
    this.stream = undefined
    stream.destroy()
  }
}
