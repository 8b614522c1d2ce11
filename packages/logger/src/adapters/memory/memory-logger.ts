import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { isLevelEnabled, type LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type LogRecord = {
  level: LogLevelName
  message: string
  payload: Record<string, unknown>
}

/**
 * Logger that keeps entries in memory.
 *
 * Children share their parent's record list, so a test can hand a root logger to
 * the code under test and read everything its scoped children wrote.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly context: LogContextPatch = {},
    private readonly sink: LogRecord[] = [],
  ) {}

  get records(): readonly LogRecord[] {
    return this.sink
  }

  /** Records at `level`, optionally narrowed to one message. */
  at(level: LogLevelName, message?: string): LogRecord[] {
    return this.sink.filter(
      (r) => r.level === level && (message === undefined || r.message === message),
    )
  }

  clear(): void {
    this.sink.length = 0
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(
      this.opts,
      { ...this.context, ...context },
      this.sink,
    )
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    if (!isLevelEnabled(level, this.opts.level ?? "trace")) return

    this.sink.push({ level, message, payload: { ...this.context, ...meta } })
  }
}
