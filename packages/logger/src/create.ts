import { NullLogger } from "./adapters/null/null-logger"
import { PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
import type { LogBindings, LogContext } from "./ports/log-context"
import type { Logger } from "./ports/logger"
import type { LoggerOptions } from "./ports/logger-options"

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  bindings: LogBindings = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, bindings)
}

export function createNullLogger<TContext extends LogContext = LogContext>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
