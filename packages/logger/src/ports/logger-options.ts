import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" drops trace and debug entries.
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off where logs are shipped
   * as JSON.
   */
  prettify?: boolean
}
