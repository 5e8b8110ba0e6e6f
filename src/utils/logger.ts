/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

let currentLogLevel: LogLevel = LogLevel.INFO; // Default level

/**
 * Sets the current logging level for the application.
 * @param level - The desired log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Maps a level name such as "debug" or "WARN" to its LogLevel.
 * Returns undefined for names that are not log levels.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case "ERROR":
      return LogLevel.ERROR;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "INFO":
      return LogLevel.INFO;
    case "DEBUG":
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

/**
 * Provides logging functionalities with level control.
 *
 * Every level writes to stderr: stdout carries the chunks, the tree JSON
 * and the rendered markdown.
 */
export const logger = {
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.error(`[debug] ${message}`);
    }
  },
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.error(message);
    }
  },
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.error(`Warning: ${message}`);
    }
  },
  /**
   * Logs an error message. ERROR is the lowest level, so this always logs.
   */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(`Error: ${message}`);
    }
  },
};
