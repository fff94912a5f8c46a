import { fileURLToPath } from "node:url"

export type CallSite = Readonly<{
  filePath: string
  line: number
}>

// "    at fn (/path/file.ts:12:5)" or "    at /path/file.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/

function toFilePath(location: string): string {
  if (!location.startsWith("file://")) return location

  try {
    return fileURLToPath(location)
  } catch {
    return location
  }
}

/** Location of the first stack frame in a V8 stack string. */
export function parseCallSite(stack: string | undefined): CallSite | undefined {
  if (!stack) return undefined

  for (const frame of stack.split("\n")) {
    const match = FRAME_PATTERN.exec(frame)
    if (!match) continue

    const [, location = "", line = ""] = match

    return { filePath: toFilePath(location), line: Number(line) }
  }

  return undefined
}

/**
 * Location of the code that called `boundary`.
 *
 * Frames from `boundary` upwards (the logging API itself) are dropped by V8,
 * so the first remaining frame is the caller.
 */
export function captureCallSite(boundary: (...args: never[]) => unknown): CallSite | undefined {
  const holder: { stack?: string } = {}
  Error.captureStackTrace(holder, boundary)

  return parseCallSite(holder.stack)
}
