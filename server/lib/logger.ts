/**
 * Simple logging utility with configurable log levels
 * Set LOG_LEVEL environment variable to control verbosity:
 * - error: Only errors
 * - warn: Errors and warnings
 * - info: Errors, warnings, and info (default for production)
 * - debug: All logs including raw model replies (default for development)
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase();

  // Default to debug in development, info in production
  if (!level) {
    return env.NODE_ENV === "production" ? "info" : "debug";
  }

  if (isLogLevel(level)) {
    return level;
  }

  return "info";
}

export type Logger = Record<LogLevel, (...args: unknown[]) => void>;

export function createLogger(level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LOG_LEVELS[level];

  return {
    error: (...args: unknown[]) => {
      if (threshold >= LOG_LEVELS.error) {
        console.error(...args);
      }
    },

    warn: (...args: unknown[]) => {
      if (threshold >= LOG_LEVELS.warn) {
        console.warn(...args);
      }
    },

    info: (...args: unknown[]) => {
      if (threshold >= LOG_LEVELS.info) {
        console.log(...args);
      }
    },

    debug: (...args: unknown[]) => {
      if (threshold >= LOG_LEVELS.debug) {
        console.log(...args);
      }
    },
  };
}

export const logger = createLogger();
