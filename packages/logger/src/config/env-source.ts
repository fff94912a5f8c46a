export type EnvSourceOptions = {
  prefix?: string
  env?: Record<string, string | undefined>
}

/** Reads the variables that start with `prefix`, keeping their full names. */
export class EnvSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  load(): Record<string, string> {
    const filtered: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined && key.startsWith(this.prefix)) {
        filtered[key] = value
      }
    }

    return filtered
  }
}
