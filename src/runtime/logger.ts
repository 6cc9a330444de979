/**
 * Minimal leveled logger.
 *
 * stdout carries the MCP protocol, so every line goes to stderr.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export type LogWriter = (line: string) => void;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function formatFields(fields: LogFields | undefined): string {
  if (!fields || Object.keys(fields).length === 0) return "";
  return " " + JSON.stringify(fields, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value,
  );
}

export function formatLogLine(level: LogLevel, scope: string, message: string, fields?: LogFields): string {
  return `[midi-graph] ${level.toUpperCase()} ${scope}: ${message}${formatFields(fields)}`;
}

export function createLogger(
  scope: string,
  level: LogLevel = "info",
  write: LogWriter = (line) => console.error(line),
): Logger {
  const threshold = RANK[level];
  const log = (at: LogLevel) => (message: string, fields?: LogFields) => {
    if (RANK[at] < threshold) return;
    write(formatLogLine(at, scope, message, fields));
  };
  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    child: (sub) => createLogger(`${scope}.${sub}`, level, write),
  };
}

/** A logger that drops everything; the default for library callers that pass none. */
export const silentLogger: Logger = createLogger("silent", "error", () => {});
