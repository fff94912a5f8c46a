import { parseLevelFilter } from "../../ports/log-level"
import { type FilterDirective, LogFilter } from "./log-filter"

export type ParsedFilterSpec = {
  filter: LogFilter
  /** Human-readable notes about parts of the spec that were ignored. */
  warnings: string[]
}

function parseDirective(
  raw: string,
  warnings: string[],
): FilterDirective | undefined {
  const parts = raw.split("=")

  if (parts.length === 1) {
    const level = parseLevelFilter(raw)

    return level ? { level } : { name: raw, level: "trace" }
  }

  const [name = "", levelText = ""] = parts.map((part) => part.trim())

  if (parts.length > 2) {
    warnings.push(`invalid logging spec '${raw}', ignoring it`)
    return undefined
  }

  if (levelText === "") return { name, level: "trace" }

  const level = parseLevelFilter(levelText)

  if (!level) {
    warnings.push(`invalid logging spec '${levelText}', ignoring it`)
    return undefined
  }

  return { name, level }
}

function upsert(directives: FilterDirective[], next: FilterDirective): void {
  const index = directives.findIndex((d) => d.name === next.name)

  if (index === -1) directives.push(next)
  else directives[index] = next
}

function compileRegex(source: string, warnings: string[]): RegExp | undefined {
  try {
    return new RegExp(source)
  } catch (err) {
    warnings.push(`invalid regex filter - ${err instanceof Error ? err.message : String(err)}`)
    return undefined
  }
}

/**
 * Parse a filter spec of the form `directive,directive,.../regex`.
 *
 * A directive is `level`, `target`, `target=` or `target=level`; levels are
 * case-insensitive and include `off`. Bare targets enable everything for that
 * target. The optional regex after `/` must match the message.
 *
 * Malformed parts are skipped and reported in `warnings`. A spec without any
 * directive lets through `error` records only.
 *
 * @example
 * ```ts
 * parseFilterSpec("warn,billing=debug,billing.ledger=off/^charge")
 * ```
 */
export function parseFilterSpec(spec: string): ParsedFilterSpec {
  const warnings: string[] = []
  const directives: FilterDirective[] = []
  let regex: RegExp | undefined

  const sections = spec.split("/")

  if (sections.length > 2) {
    warnings.push(`invalid logging spec '${spec}' (too many '/'s), ignoring it`)
  } else {
    const [mods = "", pattern] = sections

    for (const raw of mods.split(",").map((s) => s.trim())) {
      if (raw === "") continue

      const directive = parseDirective(raw, warnings)
      if (directive) upsert(directives, directive)
    }

    if (pattern !== undefined) regex = compileRegex(pattern, warnings)
  }

  if (directives.length === 0) directives.push({ level: "error" })

  return { filter: new LogFilter(directives, regex), warnings }
}
