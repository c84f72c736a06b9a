/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink writing to stderr (createConsoleSink)
 * - Append-only file sink (createFileSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtHeight, toLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink } from './file';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleAPI,
  ConsoleSinkConfig,
  FileSink,
  FileSinkConfig,
  InitMessage
} from './types';
