/**
 * Leveled logger writing to stderr.
 *
 * stdout is reserved for tool output (graph exports, MCP traffic), so every
 * level goes through console.error unless a sink is supplied.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  prefix: string;
  message: string;
  context?: Record<string, unknown>;
}

export type LogSink = (line: string, entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;

  /** Create a logger sharing this one's level and sink, with `prefix:name` as prefix */
  child(name: string): Logger;

  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

export interface LoggerOptions {
  /** Minimum level to emit (default: "info") */
  level?: LogLevel;
  /** Prefix shown in brackets before every message (default: "depgraph") */
  prefix?: string;
  /** Where formatted lines go (default: console.error) */
  sink?: LogSink;
}

const PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Render an entry as a single line.
 */
export function formatEntry(entry: LogEntry): string {
  const context =
    entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : "";
  const level = entry.level === "info" ? "" : ` ${entry.level.toUpperCase()}:`;
  return `[${entry.prefix}]${level} ${entry.message}${context}`;
}

const consoleSink: LogSink = (line) => {
  console.error(line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  // Children read the level through this box, so setLevel on any of them applies to all.
  const state = { level: options.level ?? "info" };
  return buildLogger(options.prefix ?? "depgraph", options.sink ?? consoleSink, state);
}

function buildLogger(prefix: string, sink: LogSink, state: { level: LogLevel }): Logger {
  const log = (level: LogEntry["level"], message: string, context?: Record<string, unknown>): void => {
    if (PRIORITY[level] < PRIORITY[state.level]) return;
    const entry: LogEntry = { level, prefix, message, ...(context && { context }) };
    sink(formatEntry(entry), entry);
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (name) => buildLogger(`${prefix}:${name}`, sink, state),
    setLevel: (level) => {
      state.level = level;
    },
    getLevel: () => state.level,
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });
