import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Local development only;
   * leave off wherever logs are shipped as JSON.
   */
  prettify?: boolean
}
