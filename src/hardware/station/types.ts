/**
 * Station client type definitions
 */

import type { RawSample } from '@core/resampler';
import type { Instant, Result } from '$types/common';
import type { StationError } from '$types/errors';

/**
 * Subset of the fetch Response the client reads
 */
export interface StationResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

/**
 * Fetch function signature (global fetch, or a stand-in in tests)
 */
export type FetchApi = (url: string, init: { signal: AbortSignal }) => Promise<StationResponse>;

/**
 * Station client configuration
 */
export interface StationClientConfig {
  /** Datagetter endpoint */
  baseUrl: string;
  /** Application name reported to the data provider */
  application: string;
  /** Request timeout (ms); a timeout is a network error */
  timeoutMs: number;
  /** Minimum number of predictions for a usable response */
  minSamples: number;
  /** Fetch implementation (defaults to global fetch) */
  fetchApi?: FetchApi;
}

/**
 * Remote tide source
 */
export interface StationClient {
  /**
   * Fetch raw predictions covering [now - 12 h, now + 12 h]
   * One attempt, no retry. Never rejects.
   */
  fetchSamples(stationId: string, now: Instant): Promise<Result<RawSample[], StationError>>;
}
