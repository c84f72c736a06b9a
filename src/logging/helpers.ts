/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels } from './types';

/**
 * Format tide height for log lines
 * @param heightFt - Height in feet
 * @returns Formatted height, e.g. "4.2ft"
 */
export function fmtHeight(heightFt: number): string {
  if (!isFinite(heightFt)) return 'n/a';
  return heightFt.toFixed(1) + 'ft';
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "[INFO]     "
 * - WARNING: "[WARNING]  "
 * - CRITICAL: "[CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = '[INFO]     ';
  if (level === logLevels.WARNING) tag = '[WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '[CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message should be logged at the current level
 *
 * @param level - Log level to check
 * @param currentLevel - Current minimum level
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Narrow a configured number to a log level
 * @param value - Configured value
 * @param fallback - Level used when value is not 0-3
 * @returns Log level
 */
export function toLogLevel(value: number, fallback: LogLevel): LogLevel {
  if (value === 0 || value === 1 || value === 2 || value === 3) {
    return value;
  }
  return fallback;
}
