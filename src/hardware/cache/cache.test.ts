/**
 * Tests for the file-backed cache store
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { createCacheStore } from './cache';

import { canonicalOffsets } from '@core/series';

import type { Series } from '@core/series';

const MINUTE = 60000;
const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);
const TTL = 30 * MINUTE;

function liveSeries(): Series {
  return {
    samples: canonicalOffsets().map((offsetMinutes, i) => ({ offsetMinutes, heightFt: i / 10 })),
    source: 'live',
  };
}

describe('createCacheStore', () => {
  let dir: string;
  let cachePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tide-cache-'));
    cachePath = path.join(dir, 'tide_cache.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return a stored series within the TTL tagged cached', () => {
    const store = createCacheStore({ path: cachePath, ttlMs: TTL });

    expect(store.put(liveSeries(), NOW)).toEqual({ ok: true, value: undefined });
    const hit = store.get(NOW + 29 * MINUTE);

    expect(hit).not.toBeNull();
    expect(hit?.source).toBe('cached');
    expect(hit?.samples).toEqual(liveSeries().samples);
  });

  it('should treat an entry at or past the TTL as stale', () => {
    const onMiss = vi.fn();
    const store = createCacheStore({ path: cachePath, ttlMs: TTL, onMiss: onMiss });
    store.put(liveSeries(), NOW);

    expect(store.get(NOW + 31 * MINUTE)).toBeNull();
    expect(store.get(NOW + 30 * MINUTE)).toBeNull();
    expect(onMiss).toHaveBeenCalledWith('stale', 'age 31 min');
    expect(onMiss).toHaveBeenCalledWith('stale', 'age 30 min');
  });

  it('should treat a capture time in the future as stale', () => {
    const onMiss = vi.fn();
    const store = createCacheStore({ path: cachePath, ttlMs: TTL, onMiss: onMiss });
    store.put(liveSeries(), NOW);

    expect(store.get(NOW - MINUTE)).toBeNull();
    expect(onMiss).toHaveBeenCalledWith('stale', 'captured in the future');
  });

  it('should report a missing file', () => {
    const onMiss = vi.fn();
    const store = createCacheStore({ path: cachePath, ttlMs: TTL, onMiss: onMiss });

    expect(store.get(NOW)).toBeNull();
    expect(onMiss).toHaveBeenCalledWith('missing', cachePath + ' does not exist');
  });

  it('should treat malformed JSON as corrupt', () => {
    const onMiss = vi.fn();
    fs.writeFileSync(cachePath, '{"captured_at": ', 'utf-8');
    const store = createCacheStore({ path: cachePath, ttlMs: TTL, onMiss: onMiss });

    expect(store.get(NOW)).toBeNull();
    expect(onMiss).toHaveBeenCalledTimes(1);
    expect(onMiss.mock.calls[0][0]).toBe('corrupt');
  });

  it('should treat a document flagged offline as corrupt', () => {
    const onMiss = vi.fn();
    fs.writeFileSync(cachePath, JSON.stringify({
      captured_at: new Date(NOW).toISOString(),
      samples: canonicalOffsets().map((o) => ({ offset_minutes: o, tide_ft: 5 })),
      offline: true,
    }), 'utf-8');
    const store = createCacheStore({ path: cachePath, ttlMs: TTL, onMiss: onMiss });

    expect(store.get(NOW)).toBeNull();
    expect(onMiss).toHaveBeenCalledWith('corrupt', 'offline series are never cached');
  });

  it('should treat a series with the wrong sample count as corrupt', () => {
    const onMiss = vi.fn();
    fs.writeFileSync(cachePath, JSON.stringify({
      captured_at: new Date(NOW).toISOString(),
      samples: [{ offset_minutes: -720, tide_ft: 1 }],
      offline: false,
    }), 'utf-8');
    const store = createCacheStore({ path: cachePath, ttlMs: TTL, onMiss: onMiss });

    expect(store.get(NOW)).toBeNull();
    expect(onMiss).toHaveBeenCalledWith('corrupt', 'expected 145 samples, got 1');
  });

  it('should write the documented file format', () => {
    const store = createCacheStore({ path: cachePath, ttlMs: TTL });
    store.put(liveSeries(), NOW);

    const doc = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));

    expect(doc.captured_at).toBe('2024-06-01T12:00:00.000Z');
    expect(doc.offline).toBe(false);
    expect(doc.samples).toHaveLength(145);
    expect(doc.samples[1]).toEqual({ offset_minutes: -710, tide_ft: 0.1 });
    expect(fs.existsSync(cachePath + '.tmp')).toBe(false);
  });

  it('should create the parent directory on write', () => {
    const nested = path.join(dir, 'a', 'b', 'cache.json');
    const store = createCacheStore({ path: nested, ttlMs: TTL });

    expect(store.put(liveSeries(), NOW).ok).toBe(true);
    expect(fs.existsSync(nested)).toBe(true);
  });

  it('should return a write failure instead of throwing', () => {
    const blocker = path.join(dir, 'file');
    fs.writeFileSync(blocker, 'x', 'utf-8');
    const store = createCacheStore({ path: path.join(blocker, 'cache.json'), ttlMs: TTL });

    const result = store.put(liveSeries(), NOW);

    expect(result.ok).toBe(false);
  });

  it('should replace the previous entry', () => {
    const store = createCacheStore({ path: cachePath, ttlMs: TTL });
    store.put(liveSeries(), NOW);
    const next = liveSeries();
    next.samples[0] = { offsetMinutes: -720, heightFt: 9.9 };
    store.put(next, NOW + 10 * MINUTE);

    expect(store.get(NOW + 15 * MINUTE)?.samples[0].heightFt).toBe(9.9);
  });
});
