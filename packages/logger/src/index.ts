export { NullLogger } from "./adapters/null/null-logger"
export { PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { createNullLogger, createPinoLogger } from "./create"
export type {
  CacheOutcome,
  LogBindings,
  LogContext,
  LogEvent,
  LogMeta,
} from "./ports/log-context"
export {
  isLogLevelName,
  type LogLevel,
  type LogLevelName,
  logLevelNames,
  LogLevels,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
