/**
 * Offline tide approximation
 *
 * Used when neither the cache nor the station can provide data. A single
 * semidiurnal sinusoid (12.42 h) whose phase is tied to the wall clock, so the
 * curve moves with real time and the offset 0 sample reflects "now".
 *
 * ## Accuracy
 * - Correct period, two highs and two lows per lunar day
 * - No station-specific phase, no diurnal inequality, no weather effects
 *
 * The renderer marks the result OFFLINE.
 */

import { canonicalOffsets } from '@core/series';
import { TIME_CONSTANTS } from '@utils/constants';

import type { FallbackModelConfig } from './types';
import type { Sample, Series } from '@core/series';
import type { Instant } from '$types/common';

/**
 * Default model: M2 period, ~5.6 ft range around a 5 ft mean
 */
export const DEFAULT_FALLBACK_MODEL: Readonly<FallbackModelConfig> = {
  meanLevelFt: 5.0,
  amplitudeFt: 2.8,
  periodHours: 12.42,
  lunitidalOffsetHours: 3.59,
};

/**
 * Phase of the constituent at an instant, in radians [0, 2π)
 *
 * @param now - Reference instant
 * @param model - Model parameters
 * @returns Phase angle
 */
export function clockPhase(now: Instant, model: FallbackModelConfig): number {
  const periodMs = model.periodHours * TIME_CONSTANTS.MS_PER_HOUR;
  const shifted = now + model.lunitidalOffsetHours * TIME_CONSTANTS.MS_PER_HOUR;
  const remainder = ((shifted % periodMs) + periodMs) % periodMs;
  return (remainder / periodMs) * 2 * Math.PI;
}

/**
 * Generate the synthetic series
 *
 * Pure and total: no I/O and no failure mode.
 *
 * @param now - Reference instant
 * @param model - Model parameters
 * @returns Series tagged 'fallback'
 */
export function generateFallbackSeries(
  now: Instant,
  model: FallbackModelConfig = DEFAULT_FALLBACK_MODEL
): Series {
  const phase = clockPhase(now, model);
  const radiansPerMinute = (2 * Math.PI) / (model.periodHours * TIME_CONSTANTS.MINUTES_PER_HOUR);
  const offsets = canonicalOffsets();
  const samples: Sample[] = [];

  for (let i = 0; i < offsets.length; i++) {
    const theta = phase + offsets[i] * radiansPerMinute;
    samples.push({
      offsetMinutes: offsets[i],
      heightFt: model.meanLevelFt + model.amplitudeFt * Math.sin(theta),
    });
  }

  return { samples: samples, source: 'fallback' };
}
