/**
 * Resampler helper functions
 */

import type { RawSample } from './types';
import type { Instant } from '$types/common';

/**
 * Sorted copy of raw samples by time
 * @param raw - Samples in any order
 * @returns New array, ascending by time
 */
export function sortByTime(raw: readonly RawSample[]): RawSample[] {
  return raw.slice().sort(function(a, b) {
    return a.time - b.time;
  });
}

/**
 * Linear interpolation between two raw samples
 *
 * @param left - Earlier sample
 * @param right - Later sample
 * @param target - Instant within [left.time, right.time]
 * @returns Interpolated height
 */
export function interpolate(left: RawSample, right: RawSample, target: Instant): number {
  if (right.time === left.time) {
    return left.heightFt;
  }
  const alpha = (target - left.time) / (right.time - left.time);
  return left.heightFt + alpha * (right.heightFt - left.heightFt);
}

/**
 * Index of the last sample whose time is <= target, scanning forward from a hint
 *
 * Targets are visited in ascending order, so the cursor only moves forward.
 *
 * @param sorted - Samples ascending by time
 * @param target - Instant to bracket
 * @param start - Index to scan from
 * @returns Index, or -1 when every sample is after target
 */
export function findLeftIndex(sorted: readonly RawSample[], target: Instant, start: number): number {
  let idx = start;
  if (idx < 0 || idx >= sorted.length || sorted[idx].time > target) {
    idx = -1;
  }
  while (idx + 1 < sorted.length && sorted[idx + 1].time <= target) {
    idx++;
  }
  return idx;
}
