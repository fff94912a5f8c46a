/**
 * Configuration options for an EcsLogger instance.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which records are emitted
 * - which source-location metadata is collected
 */
export type LoggerOptions = {
  /**
   * Filter directives, e.g. `"warn,db=trace/timeout"`.
   * An empty string lets through `error` records only.
   */
  filter: string

  /** Target used when neither the call nor the bindings name one. */
  target: string

  /**
   * Whether to record the caller's file and line from the stack.
   *
   * @remarks
   * Costs a stack capture per emitted record; keep it off on hot paths.
   */
  captureCallSite: boolean
}
