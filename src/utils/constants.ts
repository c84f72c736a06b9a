/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  MS_PER_MINUTE: 60000,
  MS_PER_HOUR: 3600000,
  MS_PER_DAY: 86400000,
  MINUTES_PER_HOUR: 60,
} as const;

/**
 * Canonical sample grid: -12 h .. +12 h around "now" in 10 minute steps
 */
export const SERIES_CONSTANTS = {
  WINDOW_MINUTES: 720,
  STEP_MINUTES: 10,
  SAMPLE_COUNT: 145,
  /** Index of the offset 0 sample */
  NOW_INDEX: 72,
} as const;

/**
 * Chart furniture drawn around the curve
 */
export const CHART_CONSTANTS = {
  /** Labelled ticks on the height scale, top and bottom included */
  SCALE_TICKS: 5,
  /** Samples between hour ticks on the time axis */
  SAMPLES_PER_HOUR: 6,
  /** Narrowest surface, in characters, that keeps OFFLINE, the readout and the axis labels apart */
  MIN_LABEL_COLUMNS: 16,
} as const;
