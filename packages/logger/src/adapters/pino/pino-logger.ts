import pino, { type DestinationStream, type Logger as PinoBase, type LoggerOptions as PinoOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogBindings, LogContext, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Write JSON lines here instead of stdout. Disables `prettify`. */
  destination?: DestinationStream
  /** Existing pino instance to derive from. */
  base?: PinoBase
}

export class PinoLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  protected readonly logger: PinoBase

  constructor(
    deps: PinoLoggerDeps = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    bindings: LogBindings = {},
  ) {
    this.logger = (deps.base ?? this.create(deps.destination)).child(bindings)
  }

  private create(destination?: DestinationStream): PinoBase {
    const options: PinoOptions = {
      level: this.opts.level ?? "info",
      serializers: { err: errWithCause },
      ...(this.opts.prettify === true &&
        destination === undefined && {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
          },
        }),
    }

    return destination === undefined ? pino(options) : pino(options, destination)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends LogBindings>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}
