import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. `"silent"` disables output.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Render human-readable lines through pino-pretty instead of JSON.
   * Meant for local development.
   */
  prettify?: boolean
}
