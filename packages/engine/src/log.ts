import { LOG_LEVELS, levelForTag, type LogLevel } from "./config.js";

export type LogFn = (message: string, ...meta: unknown[]) => void;

export type Log = Record<LogLevel, LogFn>;

/**
 * Tagged console logger. Lines look like `[chunks] Resized index`, with any
 * structured metadata passed through to the console untouched.
 */
export function createLog(tag: string): Log {
  const threshold = LOG_LEVELS.indexOf(levelForTag(tag));

  const writer = (level: LogLevel): LogFn => {
    if (LOG_LEVELS.indexOf(level) < threshold) return () => {};
    const line = (message: string) => `[${tag}] ${message}`;
    switch (level) {
      case "error":
        return (message, ...meta) => console.error(line(message), ...meta);
      case "warn":
        return (message, ...meta) => console.warn(line(message), ...meta);
      default:
        return (message, ...meta) => console.log(line(message), ...meta);
    }
  };

  return {
    debug: writer("debug"),
    info: writer("info"),
    warn: writer("warn"),
    error: writer("error"),
  };
}
