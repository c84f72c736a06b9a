/**
 * Boot type definitions
 */

import type { FrameDriver, LineWriter } from '@display';
import type { FetchApi } from '@hardware/station';
import type { Logger } from '@logging';
import type { SeriesSource } from '@core/series';
import type { TideService } from '@system/tide-service';
import type { Instant, TideConfig } from '$types';

/**
 * Command line options (commander opts)
 */
export type CliOptions = {
  stdout?: boolean;
  pbm?: string;
  cache?: string;
  station?: string;
  now?: string;
  quiet?: boolean;
};

/**
 * Process boundary: output streams, clock and injectable collaborators
 */
export interface RuntimeIO {
  /** Text render destination */
  stdout: LineWriter;
  /** Log lines and run summary */
  stderr: (line: string) => void;
  /** Colour stderr output */
  useColor: boolean;
  clock: () => Instant;
  /** Replaces global fetch */
  fetchApi?: FetchApi;
  /** Panel hand-off used when no --pbm file is given */
  frameDriver?: FrameDriver;
}

/**
 * Initialized application
 */
export interface App {
  config: TideConfig;
  logger: Logger;
  service: TideService;
}

/**
 * Outcome of one invocation
 */
export interface RunReport {
  exitCode: number;
  stationId: string;
  cachePath: string;
  /** Source of the series drawn, null when the run stopped earlier */
  source: SeriesSource | null;
  /** Height at offset 0, null when the run stopped earlier */
  heightFt: number | null;
  /** One line per problem when exitCode is not 0 */
  problems: string[];
}
