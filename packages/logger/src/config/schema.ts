import { z } from "zod/mini"

export const writerKinds = ["stderr", "stdout", "file"] as const

export type WriterKind = (typeof writerKinds)[number]

export const envSchema = z.object({
  /** Filter directives, e.g. `"info,db=trace"`. Empty means `error`. */
  ECS_LOG: z._default(z.string(), ""),
  ECS_LOG_WRITER: z._default(z.enum(writerKinds), "stderr"),
  ECS_LOG_FILE: z.optional(z.string().check(z.minLength(1))),
  ECS_LOG_CALL_SITE: z._default(z.stringbool(), false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type LoggerSettings = {
  filter: string
  writer: WriterKind
  /** Destination path; required when `writer` is `"file"`. */
  file?: string
  captureCallSite: boolean
}
