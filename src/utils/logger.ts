/**
 * Simple console logger with timestamps, a component prefix and a level gate.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m",  // cyan
  warn: "\x1b[33m",  // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";

/** Whether a line at `level` passes the configured `threshold` */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return level === "error" || LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Create a logger for one component, e.g. `createLogger("[Drain]", config.logging.level)`
 */
export function createLogger(prefix: string, threshold: LogLevel = "info"): Logger {
  const write = (level: LogLevel, args: unknown[]): void => {
    if (!isLevelEnabled(level, threshold)) return;

    const timestamp = new Date().toISOString();
    const line = `${LEVEL_COLORS[level]}${timestamp} ${prefix} [${level.toUpperCase()}]${RESET}`;

    if (level === "error") {
      console.error(line, ...args);
    } else if (level === "warn") {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  };

  return {
    debug: (...args) => write("debug", args),
    info: (...args) => write("info", args),
    warn: (...args) => write("warn", args),
    error: (...args) => write("error", args),
  };
}
