export { MemoryLogger, type LogRecord } from "./adapters/memory/memory-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type {
  LogContext,
  LogContextPatch,
  LogEvent,
  LogMeta,
  LogOutcome,
} from "./ports/log-context"
export {
  isLevelEnabled,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  levelSeverity,
  logLevelNames,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
