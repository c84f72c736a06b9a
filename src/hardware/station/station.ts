/**
 * Tide station client
 *
 * One GET per run against the predictions endpoint. Every failure is returned
 * as a StationError; nothing is thrown to the caller.
 */

import { err } from '$types/common';

import { buildPredictionsUrl, checkCoverage, parsePredictions } from './helpers';

import type { FetchApi, StationClient, StationClientConfig } from './types';
import type { RawSample } from '@core/resampler';
import type { Instant, Result } from '$types/common';
import type { StationError } from '$types/errors';

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Create a station client
 *
 * @param config - Client configuration
 * @returns Station client
 *
 * @example
 * ```typescript
 * const client = createStationClient({
 *   baseUrl: CONFIG.NOAA_BASE_URL,
 *   application: CONFIG.NOAA_APPLICATION,
 *   timeoutMs: CONFIG.FETCH_TIMEOUT_MS,
 *   minSamples: CONFIG.MIN_RAW_SAMPLES
 * });
 * const result = await client.fetchSamples('8418150', Date.now());
 * ```
 */
export function createStationClient(config: StationClientConfig): StationClient {
  const fetchApi: FetchApi = config.fetchApi || fetch;

  async function fetchSamples(stationId: string, now: Instant): Promise<Result<RawSample[], StationError>> {
    const url = buildPredictionsUrl(config.baseUrl, stationId, now, config.application);

    const controller = new AbortController();
    const timeoutId = setTimeout(function() {
      controller.abort();
    }, config.timeoutMs);

    let body: unknown;
    try {
      const response = await fetchApi(url, { signal: controller.signal });

      if (!response.ok) {
        return err({ kind: 'network', message: 'HTTP ' + response.status + ': ' + response.statusText });
      }

      try {
        body = await response.json();
      } catch (error) {
        if (isAbort(error)) throw error;
        return err({ kind: 'parse', message: 'invalid JSON: ' + describeFailure(error) });
      }
    } catch (error) {
      if (isAbort(error)) {
        return err({ kind: 'network', message: 'request timeout after ' + config.timeoutMs + 'ms' });
      }
      return err({ kind: 'network', message: describeFailure(error) });
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = parsePredictions(body);
    if (!parsed.ok) {
      return parsed;
    }

    return checkCoverage(parsed.value, now, config.minSamples);
  }

  return {
    fetchSamples: fetchSamples,
  };
}
