import { config } from "../config";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

let threshold: LogLevel = isLogLevel(config.LOG_LEVEL) ? config.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[threshold];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger with a "[module]" prefix
 */
export function createLogger(module: string): Logger {
  return {
    debug: (message, ...args) => {
      if (enabled("debug")) console.debug(`[${module}] ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled("info")) console.log(`[${module}] ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled("warn")) console.warn(`[${module}] ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled("error")) console.error(`[${module}] ${message}`, ...args);
    },
  };
}
