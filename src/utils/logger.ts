/**
 * Log levels in order of verbosity (most verbose first)
 */
export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "none"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

// Module-level state
let currentLogLevel: LogLevel = "info";

/**
 * Set the active log level.
 * Called once during startup with the configured level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Simple logger with configurable log levels.
 *
 * Defaults to "info" until `setLogLevel` is called.
 *
 * Log levels (from most to least verbose):
 * - debug: Detailed debugging information
 * - info: General operational information (default)
 * - warn: Warning messages, including rejected requests
 * - error: Error messages only
 * - none: No logging
 */
export const logger = {
  debug(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.debug) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  },

  info(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.info) {
      console.info(`[INFO] ${message}`, ...args);
    }
  },

  warn(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.warn) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  },

  error(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.error) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  },
};
