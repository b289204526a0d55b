import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON.
   *
   * @remarks
   * Meant for local development. Ignored when a destination stream is injected.
   */
  prettify?: boolean
}
