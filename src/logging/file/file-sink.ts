/**
 * Append-only file sink
 *
 * Keeps a history of runs on the device. Lines are prefixed with an
 * ISO-8601 timestamp.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { FileSink, FileSinkConfig } from '../types';

/**
 * Create a file sink
 *
 * @param config - Sink configuration (path, timeSource)
 * @returns File sink instance
 */
export function createFileSink(config: FileSinkConfig): FileSink {
  let lineCount = 0;

  function write(formattedMessage: string): void {
    const stamp = new Date(config.timeSource()).toISOString();
    fs.appendFileSync(config.path, stamp + ' ' + formattedMessage + '\n', 'utf-8');
    lineCount++;
  }

  /**
   * Create the log directory if needed
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    try {
      fs.mkdirSync(path.dirname(config.path), { recursive: true });
      callback(true, 'File sink writing to ' + config.path);
    } catch (err) {
      callback(false, 'File sink disabled, cannot create ' + path.dirname(config.path) + ': ' + String(err));
    }
  }

  function getLineCount(): number {
    return lineCount;
  }

  return {
    write: write,
    initialize: initialize,
    getLineCount: getLineCount
  };
}
