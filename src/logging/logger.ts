/**
 * Logger coordinator
 *
 * One formatted line per call, fanned out to every sink whose minimum level it
 * meets. Sinks that need setup (the file sink creates its directory) report
 * back through initialize() before the first run step logs anything.
 */

import { formatLogMessage, shouldLog } from './helpers';

import type { InitMessage, LogLevel, LogLevels, LogSink, Logger, LoggerConfig, LoggerDependencies } from './types';

/**
 * Create a logger instance
 *
 * @param config - Initial level
 * @param dependencies - Sinks, plus where a failing sink is reported (console.warn by default)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.DEBUG },
 *   {
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: fileSink, minLevel: LOG_LEVELS.DEBUG }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.debug('Cache miss (stale): age 45 min'); // file only
 * logger.warning('Live data unavailable (network): HTTP 503'); // both
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const sinks = dependencies.sinks || [];
  const reportSinkError = dependencies.onSinkError || function(message: string) {
    console.warn(message);
  };

  function log(level: LogLevel, msg: string): void {
    if (!shouldLog(level, currentLevel)) {
      return;
    }

    const line = formatLogMessage(level, msg, logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level >= sinks[i].minLevel) {
        deliver(sinks[i].sink, line);
      }
    }
  }

  // A throwing sink is reported and skipped; the others still get the line
  function deliver(sink: LogSink, line: string): void {
    try {
      sink.write(line);
    } catch (err) {
      reportSinkError('Logger sink error: ' + String(err));
    }
  }

  /**
   * Initialize every sink that needs it
   *
   * The callback runs once, after the last sink answered, with success true
   * only when every sink succeeded. Messages keep the sinks' order.
   *
   * @param callback - Receives (success, messages)
   */
  function initialize(callback: (success: boolean, messages: InitMessage[]) => void): void {
    const pending: LogSink[] = [];
    for (let i = 0; i < sinks.length; i++) {
      if (sinks[i].sink.initialize) {
        pending.push(sinks[i].sink);
      }
    }

    const results: InitMessage[] = [];
    let answered = 0;

    if (pending.length === 0) {
      callback(true, results);
      return;
    }

    pending.forEach(function(sink, index) {
      const init = sink.initialize;
      if (!init) return;

      init.call(sink, function(success: boolean, message: string) {
        results[index] = { success: success, message: message };
        answered++;
        if (answered === pending.length) {
          callback(results.every(function(r) { return r.success; }), results);
        }
      });
    });
  }

  return {
    log: log,
    debug: function(msg: string) {
      log(logLevels.DEBUG, msg);
    },
    info: function(msg: string) {
      log(logLevels.INFO, msg);
    },
    warning: function(msg: string) {
      log(logLevels.WARNING, msg);
    },
    critical: function(msg: string) {
      log(logLevels.CRITICAL, msg);
    },
    setLevel: function(newLevel: LogLevel) {
      currentLevel = newLevel;
    },
    getLevel: function() {
      return currentLevel;
    },
    initialize: initialize
  };
}
