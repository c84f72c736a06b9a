/**
 * Console output sink
 *
 * Writes each formatted line to stderr as it arrives. stdout carries the
 * text render.
 */

import chalk from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogSink } from '../types';

/**
 * Pick a colour for a formatted line from its level tag
 * @param formattedMessage - Line starting with a level tag
 * @returns Coloured line
 */
function colorize(formattedMessage: string): string {
  if (formattedMessage.indexOf('[CRITICAL]') === 0) return chalk.red.bold(formattedMessage);
  if (formattedMessage.indexOf('[WARNING]') === 0) return chalk.yellow(formattedMessage);
  if (formattedMessage.indexOf('[DEBUG]') === 0) return chalk.gray(formattedMessage);
  return formattedMessage;
}

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { useColor: process.stderr.isTTY === true });
 * consoleSink.write("[INFO]     Rendered 145 samples");
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): LogSink {
  function write(formattedMessage: string): void {
    consoleApi.error(config.useColor ? colorize(formattedMessage) : formattedMessage);
  }

  return {
    write: write
  };
}
