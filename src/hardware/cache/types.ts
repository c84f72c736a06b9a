/**
 * Cache store type definitions
 */

import type { Series } from '@core/series';
import type { Instant, Result } from '$types/common';
import type { CacheMissReason } from '$types/errors';

/**
 * On-disk cache document
 */
export interface CacheFileFormat {
  /** ISO-8601 capture instant */
  captured_at: string;
  samples: { offset_minutes: number; tide_ft: number }[];
  /** True when the stored series came from the offline model */
  offline: boolean;
}

/**
 * Decoded cache entry
 */
export interface CacheEntry {
  series: Series;
  capturedAt: Instant;
}

/**
 * Cache store configuration
 */
export interface CacheStoreConfig {
  /** Cache file path; the parent directory is created on write */
  path: string;
  /** Entries at least this old (ms) are stale */
  ttlMs: number;
  /** Observer for misses, used for logging */
  onMiss?: (reason: CacheMissReason, detail: string) => void;
}

/**
 * Single-slot, TTL-gated series cache
 *
 * Contract: invocations do not overlap. There is no locking between
 * processes; a write replaces the file by rename, so a concurrent reader sees
 * either the old or the new entry, never a partial one.
 */
export interface CacheStore {
  /** Fresh cached series tagged 'cached', or null on any miss */
  get(now: Instant): Series | null;
  /** Replace the slot; returns the failure message instead of throwing */
  put(series: Series, now: Instant): Result<void, string>;
}
