/**
 * Text sink type definitions
 */

import type { PixelSink } from '../types';

/**
 * Destination for finished rows (stdout in the CLI)
 */
export type LineWriter = (line: string) => void;

export interface TextSinkConfig {
  columns: number;
  rows: number;
  writer: LineWriter;
}

/**
 * Text grid sink with read access for inspection
 */
export interface TextSink extends PixelSink {
  /** Rows as currently drawn, right-trimmed */
  getLines(): string[];
}
