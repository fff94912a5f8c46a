import type { LogWriter } from "../../ports/log-writer"

/** Keeps written lines in memory; useful in tests and for buffering diagnostics. */
export class MemoryWriter implements LogWriter {
  private readonly lines: string[] = []

  writeLine(line: string): void {
    this.lines.push(line)
  }

  /** Lines written so far, without terminators. */
  read(): string[] {
    return [...this.lines]
  }

  /** Everything written so far, as it would appear in a stream. */
  text(): string {
    return this.lines.map((line) => `${line}\n`).join("")
  }

  clear(): void {
    this.lines.length = 0
  }
}
