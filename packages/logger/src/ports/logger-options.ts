import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. Entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print through `pino-pretty` for local development.
   * Ignored when an explicit destination stream is supplied.
   */
  prettify?: boolean
}
