import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Where JSON lines are written. Defaults to stdout. Ignored when
   * `prettify` is set, since pino-pretty runs as a transport.
   */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly logger: PinoLoggerBase

  constructor(
    deps: PinoLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.logger = base ? base.child(bindings) : this.createRoot(deps).child(bindings)
  }

  private createRoot(deps: PinoLoggerDeps): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level !== undefined && { level: this.opts.level }),
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) {
      return pino({
        ...pinoOpts,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "hostname,pid" },
        },
      })
    }

    return deps.destination ? pino(pinoOpts, deps.destination) : pino(pinoOpts)
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

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({}, this.opts, context, this.logger)
  }
}

export function createPinoLogger(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  bindings: LogContextPatch = {},
): Logger {
  return new PinoLogger(deps, opts, bindings)
}
