/**
 * Structured, level-based logging.
 *
 * Harness components log through child loggers that carry scenario, run and
 * report identifiers. Entries are written as JSON lines to stderr so that a
 * sweep summary printed on stdout stays machine-readable. Replace the sink
 * with setLogHandler().
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

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.Debug]: 10,
  [LogLevel.Info]: 20,
  [LogLevel.Warn]: 30,
  [LogLevel.Error]: 40,
};

/** Error instances do not survive JSON.stringify; flatten them first. */
function toJsonValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatLogLine(entry: LogEntry): string {
  const line: Record<string, unknown> = { ts: entry.timestamp, level: entry.level, msg: entry.message };
  for (const [key, value] of Object.entries(entry.context ?? {})) {
    if (value !== undefined) line[key] = toJsonValue(value);
  }
  return JSON.stringify(line);
}

const stderrHandler: LogHandler = (entry) => {
  process.stderr.write(`${formatLogLine(entry)}\n`);
};

let handler: LogHandler = stderrHandler;
let minLevel: LogLevel = LogLevel.Info;

/** Replace the log handler (e.g., for testing or external log systems). */
export function setLogHandler(next: LogHandler): void {
  handler = next;
}

/** Restore the stderr JSON handler. */
export function resetLogHandler(): void {
  handler = stderrHandler;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

/** Parse a level name, returning undefined for anything unrecognized. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

/** Create a logger whose entries all carry `baseContext`. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
    emit(level, message, { ...baseContext, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'scenario-harness' });
