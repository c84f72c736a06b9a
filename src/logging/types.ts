/**
 * Logging type definitions
 */

/**
 * 0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL (CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3;

/**
 * Level constants, passed in rather than read from CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Set up sinks; callback gets overall success and one message per sink */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
}

export interface LoggerConfig {
  /** Messages below this level reach no sink */
  level: LogLevel;
}

export interface SinkWithLevel {
  sink: LogSink;
  /** Lowest level this sink receives */
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  sinks: SinkWithLevel[];
  /** Receives a line when a sink throws; console.warn when omitted */
  onSinkError?: (message: string) => void;
}

/**
 * Output for already formatted, already filtered lines
 */
export interface LogSink {
  write(formattedMessage: string): void;
  /** Optional setup, e.g. creating the log directory */
  initialize?(callback: (success: boolean, message: string) => void): void;
}

/**
 * The part of console the console sink uses. Log lines go to stderr because
 * stdout carries the text render.
 */
export interface ConsoleAPI {
  error(message: string): void;
}

export interface ConsoleSinkConfig {
  /** Colour level tags (off when stderr is not a TTY) */
  useColor: boolean;
}

export interface FileSink extends LogSink {
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Lines written since creation */
  getLineCount(): number;
}

export interface FileSinkConfig {
  /** Appended to, never truncated */
  path: string;
  /** Epoch milliseconds for line timestamps */
  timeSource: () => number;
}

/**
 * One sink's answer to initialize()
 */
export interface InitMessage {
  success: boolean;
  message: string;
}
