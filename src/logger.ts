/**
 * Module: Logger
 * Purpose: Leveled console logging with a `[scope]` prefix per module. The threshold is
 * process-wide and set from configuration at startup.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const enabled = (level: Exclude<LogLevel, "silent">): boolean => LEVEL_RANK[level] >= LEVEL_RANK[threshold];

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
  };
}
