/**
 * Series resampler
 *
 * Converts irregular raw samples into the canonical 145-sample grid around a
 * reference instant by linear interpolation. No extrapolation: a grid point
 * outside the raw coverage is a range error.
 */

import { canonicalOffsets } from '@core/series';
import { addMinutes } from '@utils/time';
import { err, ok } from '$types/common';

import { findLeftIndex, interpolate, sortByTime } from './helpers';

import type { RawSample } from './types';
import type { Sample } from '@core/series';
import type { Instant, Result } from '$types/common';
import type { ResampleRangeError } from '$types/errors';

/**
 * Resample raw data to the canonical grid
 *
 * An exact timestamp match uses the raw value unchanged.
 *
 * @param raw - Raw samples, any order
 * @param now - Reference instant (offset 0)
 * @returns 145 samples, or the first offset that could not be bracketed
 */
export function resampleSeries(
  raw: readonly RawSample[],
  now: Instant
): Result<Sample[], ResampleRangeError> {
  const sorted = sortByTime(raw);
  const offsets = canonicalOffsets();
  const samples: Sample[] = [];
  let cursor = 0;

  for (let i = 0; i < offsets.length; i++) {
    const target = addMinutes(now, offsets[i]);
    const left = findLeftIndex(sorted, target, cursor);

    if (left < 0) {
      return err(rangeError(offsets[i], 'before the first raw sample'));
    }
    cursor = left;

    if (sorted[left].time === target) {
      samples.push({ offsetMinutes: offsets[i], heightFt: sorted[left].heightFt });
      continue;
    }

    if (left + 1 >= sorted.length) {
      return err(rangeError(offsets[i], 'after the last raw sample'));
    }

    samples.push({
      offsetMinutes: offsets[i],
      heightFt: interpolate(sorted[left], sorted[left + 1], target),
    });
  }

  return ok(samples);
}

function rangeError(offsetMinutes: number, where: string): ResampleRangeError {
  return {
    kind: 'range',
    message: 'offset ' + offsetMinutes + ' min is ' + where,
    offsetMinutes: offsetMinutes,
  };
}
