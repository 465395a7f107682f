import { LOG_LEVEL_ENV } from "../config";

/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const levelNames: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Maps a level name (case-insensitive) to a {@link LogLevel}.
 * Missing or unknown names fall back to INFO.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  return levelNames[value.trim().toLowerCase()] ?? LogLevel.INFO;
}

let currentLogLevel: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]);

/**
 * Sets the current logging level for the application.
 * @param level - The desired log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Console logger gated by the current level.
 */
export const logger = {
  /**
   * Logs a debug message when the level is DEBUG.
   * @param message - The message to log.
   */
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  /**
   * Logs an info message when the level is INFO or DEBUG.
   * @param message - The message to log.
   */
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message);
    }
  },
  /**
   * Logs a warning unless the level is ERROR.
   * @param message - The message to log.
   */
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  /**
   * Logs an error at every level.
   * @param message - The message to log.
   */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
