/**
 * Scoped logger. Lines go to stderr by default: stdout belongs to the MCP
 * stdio transport and to echoed child output.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Minimum level written. Default: "info" */
  level?: LogLevel;
  /** Receives each formatted line. Default: console.error */
  sink?: (line: string) => void;
}

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = RANK[options.level ?? "info"];
  const sink = options.sink ?? ((line: string) => console.error(line));

  const emit = (level: Exclude<LogLevel, "silent">, label: string, message: string): void => {
    if (RANK[level] < threshold) return;
    sink(`[${scope}] ${label}${message}`);
  };

  return {
    scope,
    debug: (message) => emit("debug", "debug: ", message),
    info: (message) => emit("info", "", message),
    warn: (message) => emit("warn", "WARN: ", message),
    error: (message) => emit("error", "ERROR: ", message),
  };
}
