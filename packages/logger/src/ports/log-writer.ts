/**
 * Destination for formatted log lines.
 *
 * Writers are synchronous: `writeLine` returns once the line has been handed
 * to the underlying sink, or throws if the sink rejected it.
 */
export interface LogWriter {
  /** Writes one line. The writer appends its own line terminator. */
  writeLine(line: string): void
}
