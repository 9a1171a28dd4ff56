/**
 * Logger abstraction.
 *
 * Structured, level-based logging with persistent context. Every pipeline
 * run logs through a child logger carrying its `runId`, and each stage adds
 * its `stage` name on top. Consumers redirect output with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default handler: one JSON line per entry on stdout/stderr. */
const defaultLogHandler: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  if (entry.level === LogLevel.Error || entry.level === LogLevel.Warn) {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the log handler (tests, external log systems). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restore the JSON-lines handler. */
export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Parse a level name (case-insensitive); unknown names yield undefined. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

/** Flatten an unknown thrown value into loggable fields. */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Create a logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'media-pipeline' });
