/**
 * Structured logging for the client.
 *
 * Entries are level-filtered and carry the context of every logger they were
 * derived through (client, request, module). By default each entry is one
 * JSON line on stderr, so a caller piping artifact bytes to stdout never sees
 * log output mixed in. Route entries elsewhere with setLogHandler().
 *
 * Usage:
 *   const log = logger.child({ module: 'artifacts' });
 *   log.debug('Download started', { ref: 'main' });
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

const DEFAULT_LEVEL = LogLevel.Info;

/** Errors do not survive JSON.stringify; keep their name and message. */
function serializeContext(context: Record<string, unknown> = {}): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

const stderrLogHandler: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...serializeContext(entry.context),
  });
  process.stderr.write(`${line}\n`);
};

let currentHandler: LogHandler = stderrLogHandler;
let currentMinLevel: LogLevel = DEFAULT_LEVEL;

/** Replace the log handler (e.g., to capture entries in tests or forward them to an app logger). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentMinLevel;
}

/** Restore the stderr handler and the Info threshold. */
export function resetLogging(): void {
  currentHandler = stderrLogHandler;
  currentMinLevel = DEFAULT_LEVEL;
}

/** Map a level name (case-insensitive) to a LogLevel; undefined when unknown. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

/** Apply GITLAB_LOG_LEVEL, if set to a known level. */
export function configureLoggingFromEnv(env: Record<string, string | undefined> = process.env): void {
  const level = parseLogLevel(env.GITLAB_LOG_LEVEL);
  if (level !== undefined) {
    setLogLevel(level);
  }
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (!isEnabled(level)) return;
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
  /** Whether entries at `level` currently reach the handler. */
  isEnabled(level: LogLevel): boolean;
  child(context: Record<string, unknown>): Logger;
}

/** Create a logger whose entries always carry `baseContext`. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    isEnabled,
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'gitlab-artifacts-client' });
