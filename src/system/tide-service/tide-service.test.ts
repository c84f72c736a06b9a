/**
 * Tests for the tide service state machine
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { createTideService } from './tide-service';

import { generateFallbackSeries } from '@core/fallback';
import { canonicalOffsets, validateSeries } from '@core/series';
import { createCacheStore } from '@hardware/cache';
import { createLogger } from '@logging';
import { err, ok } from '$types/common';

import type { RawSample } from '@core/resampler';
import type { Series } from '@core/series';
import type { CacheStore } from '@hardware/cache';
import type { StationClient } from '@hardware/station';
import type { Logger } from '@logging';
import type { Result } from '$types/common';
import type { StationError } from '$types/errors';

const MINUTE = 60000;
const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);
const MLLW = { showMsl: false, mslOffsetFt: 4.9 };

function hourlyRamp(fromHours = -13, toHours = 13): RawSample[] {
  const raw: RawSample[] = [];
  for (let h = fromHours; h <= toHours; h++) {
    raw.push({ time: NOW + h * 60 * MINUTE, heightFt: h + 13 });
  }
  return raw;
}

function cachedSeries(): Series {
  return { samples: canonicalOffsets().map((offsetMinutes) => ({ offsetMinutes, heightFt: 3 })), source: 'cached' };
}

function createMemoryLogger(lines: string[]): Logger {
  return createLogger(
    { level: 0 },
    { sinks: [{ sink: { write: (msg: string) => lines.push(msg) }, minLevel: 0 }] },
    { DEBUG: 0, INFO: 1, WARNING: 2, CRITICAL: 3 }
  );
}

function createFakeCache(hit: Series | null = null) {
  const get = vi.fn<CacheStore['get']>().mockReturnValue(hit);
  const put = vi.fn<CacheStore['put']>().mockReturnValue(ok(undefined));
  return { get: get, put: put };
}

function createFakeClient(result: Result<RawSample[], StationError>) {
  return { fetchSamples: vi.fn<StationClient['fetchSamples']>().mockResolvedValue(result) };
}

describe('createTideService', () => {
  let lines: string[];
  let logger: Logger;

  beforeEach(() => {
    lines = [];
    logger = createMemoryLogger(lines);
  });

  it('should return a fresh cache entry without fetching', async () => {
    const cache = createFakeCache(cachedSeries());
    const client = createFakeClient(ok(hourlyRamp()));
    const service = createTideService({ cache, client, logger, datum: MLLW, stationId: '8418150' });

    const series = await service.getCurrentSeries(NOW);

    expect(series.source).toBe('cached');
    expect(client.fetchSamples).not.toHaveBeenCalled();
    expect(service.getLastTrace()).toEqual(['TRY_CACHE', 'DONE']);
  });

  it('should fetch, resample and store a live series on a cache miss', async () => {
    const cache = createFakeCache();
    const client = createFakeClient(ok(hourlyRamp()));
    const service = createTideService({ cache, client, logger, datum: MLLW, stationId: '8418150' });

    const series = await service.getCurrentSeries(NOW);

    expect(series.source).toBe('live');
    expect(validateSeries(series.samples)).toBeNull();
    expect(series.samples[72].heightFt).toBe(13);
    expect(series.samples[0].heightFt).toBe(1);
    expect(client.fetchSamples).toHaveBeenCalledWith('8418150', NOW);
    expect(cache.put).toHaveBeenCalledWith(series, NOW);
    expect(service.getLastTrace()).toEqual(['TRY_CACHE', 'TRY_LIVE', 'DONE']);
  });

  it('should fall back when the station is unreachable', async () => {
    const cache = createFakeCache();
    const client = createFakeClient(err({ kind: 'network', message: 'connect ECONNREFUSED' }));
    const service = createTideService({ cache, client, logger, datum: MLLW, stationId: '8418150' });

    const series = await service.getCurrentSeries(NOW);

    expect(series.source).toBe('fallback');
    expect(series.samples).toEqual(generateFallbackSeries(NOW).samples);
    expect(cache.put).not.toHaveBeenCalled();
    expect(lines).toContain('[WARNING]  Live data unavailable (network): connect ECONNREFUSED');
    expect(service.getLastTrace()).toEqual(['TRY_CACHE', 'TRY_LIVE', 'FALLBACK', 'DONE']);
  });

  it('should fall back when the data does not cover the window', async () => {
    const cache = createFakeCache();
    const client = createFakeClient(ok(hourlyRamp(-13, 6)));
    const service = createTideService({ cache, client, logger, datum: MLLW, stationId: '8418150' });

    const series = await service.getCurrentSeries(NOW);

    expect(series.source).toBe('fallback');
    expect(lines).toContain('[WARNING]  Live data unavailable (range): offset 370 min is after the last raw sample');
  });

  it('should still return the live series when the cache write fails', async () => {
    const cache = createFakeCache();
    cache.put.mockReturnValue(err('disk full'));
    const client = createFakeClient(ok(hourlyRamp()));
    const service = createTideService({ cache, client, logger, datum: MLLW, stationId: '8418150' });

    const series = await service.getCurrentSeries(NOW);

    expect(series.source).toBe('live');
    expect(lines).toContain('[WARNING]  Cache write failed: disk full');
  });

  it('should shift live heights to MSL when configured', async () => {
    const cache = createFakeCache();
    const client = createFakeClient(ok(hourlyRamp()));
    const service = createTideService({
      cache, client, logger, datum: { showMsl: true, mslOffsetFt: 4.9 }, stationId: '8418150',
    });

    const series = await service.getCurrentSeries(NOW);

    expect(series.samples[72].heightFt).toBeCloseTo(8.1, 10);
  });

  it('should shift fallback heights to MSL when configured', async () => {
    const cache = createFakeCache();
    const client = createFakeClient(err({ kind: 'parse', message: 'missing predictions array' }));
    const service = createTideService({
      cache, client, logger, datum: { showMsl: true, mslOffsetFt: 4.9 }, stationId: '8418150',
    });

    const series = await service.getCurrentSeries(NOW);
    const mllw = generateFallbackSeries(NOW);

    expect(series.samples[72].heightFt).toBeCloseTo(mllw.samples[72].heightFt - 4.9, 10);
  });

  describe('with a file cache', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tide-service-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should serve the second call within the TTL from cache', async () => {
      const cache = createCacheStore({ path: path.join(dir, 'cache.json'), ttlMs: 30 * MINUTE });
      const client = createFakeClient(ok(hourlyRamp()));
      const service = createTideService({ cache, client, logger, datum: MLLW, stationId: '8418150' });

      const first = await service.getCurrentSeries(NOW);
      const second = await service.getCurrentSeries(NOW);

      expect(first.source).toBe('live');
      expect(second.source).toBe('cached');
      expect(second.samples).toEqual(first.samples);
      expect(client.fetchSamples).toHaveBeenCalledTimes(1);
    });
  });
});
