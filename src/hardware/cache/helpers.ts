/**
 * Cache document encoding and decoding
 */

import { validateSeries } from '@core/series';
import { isFiniteNumber } from '@utils/number';
import { parseIsoInstant } from '@utils/time';
import { err, ok } from '$types/common';

import type { CacheEntry, CacheFileFormat } from './types';
import type { Sample, Series } from '@core/series';
import type { Instant, Result } from '$types/common';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encode a series for storage
 * @param series - Series to store
 * @param capturedAt - Capture instant
 * @returns Cache document
 */
export function encodeEntry(series: Series, capturedAt: Instant): CacheFileFormat {
  return {
    captured_at: new Date(capturedAt).toISOString(),
    samples: series.samples.map(function(s) {
      return { offset_minutes: s.offsetMinutes, tide_ft: s.heightFt };
    }),
    offline: series.source === 'fallback',
  };
}

/**
 * Decode and validate a cache document
 *
 * @param data - Parsed JSON
 * @returns Entry with source 'cached', or a description of what is wrong
 *   (documents flagged offline are rejected)
 */
export function decodeEntry(data: unknown): Result<CacheEntry, string> {
  if (!isRecord(data)) {
    return err('document is not an object');
  }

  if (typeof data.captured_at !== 'string') {
    return err('captured_at missing');
  }
  const capturedAt = parseIsoInstant(data.captured_at);
  if (capturedAt === null) {
    return err('captured_at is not a date: ' + data.captured_at);
  }

  // Only live series are stored
  if (data.offline !== undefined && typeof data.offline !== 'boolean') {
    return err('offline is not a boolean');
  }
  if (data.offline === true) {
    return err('offline series are never cached');
  }

  if (!Array.isArray(data.samples)) {
    return err('samples missing');
  }

  const samples: Sample[] = [];
  for (let i = 0; i < data.samples.length; i++) {
    const entry: unknown = data.samples[i];
    if (!isRecord(entry) || !isFiniteNumber(entry.offset_minutes) || !isFiniteNumber(entry.tide_ft)) {
      return err('malformed sample at index ' + i);
    }
    samples.push({ offsetMinutes: entry.offset_minutes, heightFt: entry.tide_ft });
  }

  const violation = validateSeries(samples);
  if (violation !== null) {
    return err(violation);
  }

  return ok({ series: { samples: samples, source: 'cached' }, capturedAt: capturedAt });
}
