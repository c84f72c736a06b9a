/**
 * Series invariants and transformations
 */

import { SERIES_CONSTANTS } from '@utils/constants';
import { isFiniteNumber } from '@utils/number';

import type { DatumConfig, Sample, Series } from './types';

/**
 * Canonical offsets: -720, -710, ..., 710, 720
 * @returns Fresh array of 145 offsets
 */
export function canonicalOffsets(): number[] {
  const offsets: number[] = [];
  for (let i = 0; i < SERIES_CONSTANTS.SAMPLE_COUNT; i++) {
    offsets.push(-SERIES_CONSTANTS.WINDOW_MINUTES + i * SERIES_CONSTANTS.STEP_MINUTES);
  }
  return offsets;
}

/**
 * Check the series invariants
 *
 * @param samples - Samples to check
 * @returns Description of the first violation, or null when the samples are valid
 */
export function validateSeries(samples: readonly Sample[]): string | null {
  if (samples.length !== SERIES_CONSTANTS.SAMPLE_COUNT) {
    return 'expected ' + SERIES_CONSTANTS.SAMPLE_COUNT + ' samples, got ' + samples.length;
  }

  for (let i = 0; i < samples.length; i++) {
    const expected = -SERIES_CONSTANTS.WINDOW_MINUTES + i * SERIES_CONSTANTS.STEP_MINUTES;
    if (samples[i].offsetMinutes !== expected) {
      return 'sample ' + i + ' has offset ' + samples[i].offsetMinutes + ', expected ' + expected;
    }
    if (!isFiniteNumber(samples[i].heightFt)) {
      return 'sample ' + i + ' has non-finite height';
    }
  }

  return null;
}

/**
 * Sample at offset 0
 * @param series - Valid series
 * @returns The "now" sample
 */
export function nowSample(series: Series): Sample {
  return series.samples[SERIES_CONSTANTS.NOW_INDEX];
}

/**
 * Apply the configured height datum
 *
 * Station data and the fallback model are both MLLW based.
 *
 * @param samples - MLLW samples
 * @param datum - Datum configuration
 * @returns New samples (input untouched)
 */
export function applyDatum(samples: readonly Sample[], datum: DatumConfig): Sample[] {
  const shift = datum.showMsl ? datum.mslOffsetFt : 0;
  return samples.map(function(s) {
    return { offsetMinutes: s.offsetMinutes, heightFt: s.heightFt - shift };
  });
}

/**
 * Copy a series with a different source tag
 * @param series - Series to retag
 * @param source - New source
 * @returns Retagged copy
 */
export function withSource(series: Series, source: Series['source']): Series {
  return { samples: series.samples.slice(), source: source };
}
