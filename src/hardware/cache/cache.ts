/**
 * File-backed cache store
 *
 * Holds the last live series so runs within the TTL skip the network.
 * Reads never throw; writes go to a temporary file that is renamed over the
 * slot.
 */

import * as fs from 'fs';
import * as path from 'path';

import { err, ok } from '$types/common';

import { decodeEntry, encodeEntry } from './helpers';

import type { CacheStore, CacheStoreConfig } from './types';
import type { Series } from '@core/series';
import type { Instant, Result } from '$types/common';
import type { CacheMissReason } from '$types/errors';

/**
 * Create a cache store
 *
 * @param config - Store configuration
 * @returns Cache store
 */
export function createCacheStore(config: CacheStoreConfig): CacheStore {
  function miss(reason: CacheMissReason, detail: string): null {
    if (config.onMiss) {
      config.onMiss(reason, detail);
    }
    return null;
  }

  function get(now: Instant): Series | null {
    if (!fs.existsSync(config.path)) {
      return miss('missing', config.path + ' does not exist');
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(config.path, 'utf-8'));
    } catch (error) {
      return miss('corrupt', 'unreadable: ' + String(error));
    }

    const decoded = decodeEntry(data);
    if (!decoded.ok) {
      return miss('corrupt', decoded.error);
    }

    const ageMs = now - decoded.value.capturedAt;
    if (ageMs < 0) {
      return miss('stale', 'captured in the future');
    }
    if (ageMs >= config.ttlMs) {
      return miss('stale', 'age ' + Math.floor(ageMs / 60000) + ' min');
    }

    return decoded.value.series;
  }

  function put(series: Series, now: Instant): Result<void, string> {
    const tmpPath = config.path + '.tmp';
    try {
      fs.mkdirSync(path.dirname(config.path), { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(encodeEntry(series, now)), 'utf-8');
      fs.renameSync(tmpPath, config.path);
      return ok(undefined);
    } catch (error) {
      return err('cannot write ' + config.path + ': ' + String(error));
    }
  }

  return {
    get: get,
    put: put,
  };
}
