/**
 * Station client helper functions
 * Request building and response validation, no I/O
 */

import { SERIES_CONSTANTS, TIME_CONSTANTS } from '@utils/constants';
import { formatUtcDate, parseUtcTimestamp } from '@utils/time';
import { err, ok } from '$types/common';

import type { RawSample } from '@core/resampler';
import type { Instant, Result } from '$types/common';
import type { StationError } from '$types/errors';

/**
 * Build the predictions request URL
 *
 * Requests the UTC day before through the UTC day after `now` so the 24 h
 * window is covered whatever the time of day.
 *
 * @param baseUrl - Datagetter endpoint
 * @param stationId - Station identifier
 * @param now - Reference instant
 * @param application - Application name
 * @returns Request URL
 */
export function buildPredictionsUrl(
  baseUrl: string,
  stationId: string,
  now: Instant,
  application: string
): string {
  const url = new URL(baseUrl);
  url.searchParams.set('product', 'predictions');
  url.searchParams.set('application', application);
  url.searchParams.set('begin_date', formatUtcDate(now - TIME_CONSTANTS.MS_PER_DAY));
  url.searchParams.set('end_date', formatUtcDate(now + TIME_CONSTANTS.MS_PER_DAY));
  url.searchParams.set('datum', 'MLLW');
  url.searchParams.set('station', stationId);
  url.searchParams.set('time_zone', 'gmt');
  url.searchParams.set('units', 'english');
  url.searchParams.set('format', 'json');
  return url.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseError(message: string): StationError {
  return { kind: 'parse', message: message };
}

/**
 * Parse a predictions document
 *
 * Expected shape: `{ predictions: [{ t: "YYYY-MM-DD HH:MM", v: "1.234" }] }`.
 * A provider error document (`{ error: { message } }`) or any malformed entry
 * rejects the whole response.
 *
 * @param body - Decoded JSON body
 * @returns Samples sorted by time
 */
export function parsePredictions(body: unknown): Result<RawSample[], StationError> {
  if (!isRecord(body)) {
    return err(parseError('response is not an object'));
  }

  if (isRecord(body.error)) {
    const detail = typeof body.error.message === 'string' ? body.error.message : 'unknown error';
    return err(parseError('station error: ' + detail));
  }

  const predictions = body.predictions;
  if (!Array.isArray(predictions)) {
    return err(parseError('missing predictions array'));
  }

  const samples: RawSample[] = [];
  for (let i = 0; i < predictions.length; i++) {
    const entry: unknown = predictions[i];
    if (!isRecord(entry) || typeof entry.t !== 'string' || typeof entry.v !== 'string') {
      return err(parseError('malformed prediction at index ' + i));
    }

    const time = parseUtcTimestamp(entry.t);
    if (time === null) {
      return err(parseError('bad timestamp "' + entry.t + '" at index ' + i));
    }

    const heightFt = entry.v.trim() === '' ? NaN : Number(entry.v);
    if (!isFinite(heightFt)) {
      return err(parseError('bad height "' + entry.v + '" at index ' + i));
    }

    samples.push({ time: time, heightFt: heightFt });
  }

  samples.sort(function(a, b) {
    return a.time - b.time;
  });

  return ok(samples);
}

/**
 * Check that sorted samples can cover the display window
 *
 * @param samples - Samples sorted by time
 * @param now - Reference instant
 * @param minSamples - Minimum sample count
 * @returns The samples, or an insufficient-data error
 */
export function checkCoverage(
  samples: RawSample[],
  now: Instant,
  minSamples: number
): Result<RawSample[], StationError> {
  if (samples.length < minSamples) {
    return err({
      kind: 'insufficient-data',
      message: 'got ' + samples.length + ' predictions, need at least ' + minSamples,
    });
  }

  const halfWindowMs = SERIES_CONSTANTS.WINDOW_MINUTES * TIME_CONSTANTS.MS_PER_MINUTE;
  const first = samples[0].time;
  const last = samples[samples.length - 1].time;
  if (first > now - halfWindowMs || last < now + halfWindowMs) {
    return err({
      kind: 'insufficient-data',
      message: 'predictions ' + new Date(first).toISOString() + ' .. ' +
        new Date(last).toISOString() + ' do not cover the display window',
    });
  }

  return ok(samples);
}
