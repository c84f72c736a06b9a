/**
 * Tide series type definitions
 *
 * A series is the 24 hour window the display shows: 145 samples at
 * -720, -710, ..., 0, ..., +720 minutes from the reference instant.
 */

/**
 * Where a series came from
 * - live: fetched and resampled during this run
 * - cached: read back from the snapshot of an earlier live fetch
 * - fallback: synthetic curve, shown with an OFFLINE indicator
 */
export type SeriesSource = 'live' | 'cached' | 'fallback';

/**
 * One point of the curve
 */
export interface Sample {
  /** Minutes relative to now: -720..720 in steps of 10 */
  offsetMinutes: number;

  /** Tide height in feet (MLLW, or MSL when configured) */
  heightFt: number;
}

/**
 * Complete display window
 */
export interface Series {
  /** Exactly 145 samples, offsets strictly increasing by 10 */
  samples: Sample[];

  source: SeriesSource;
}

/**
 * Height reference applied to outgoing series
 */
export interface DatumConfig {
  /** Subtract mslOffsetFt so heights are relative to mean sea level */
  showMsl: boolean;

  /** MLLW to MSL offset in feet */
  mslOffsetFt: number;
}
