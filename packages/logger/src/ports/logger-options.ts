import type { LogLevelName } from "./log-level"

/**
 * Options shared by every Logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses trace and debug.
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off where JSON lines
   * are collected.
   */
  prettify?: boolean
}
