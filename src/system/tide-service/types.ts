/**
 * Tide service type definitions
 */

import type { FallbackModelConfig } from '@core/fallback';
import type { DatumConfig, Series } from '@core/series';
import type { CacheStore } from '@hardware/cache';
import type { StationClient } from '@hardware/station';
import type { Logger } from '@logging';
import type { Instant } from '$types/common';

/**
 * Acquisition states, visited in this order
 */
export type AcquisitionState = 'TRY_CACHE' | 'TRY_LIVE' | 'FALLBACK' | 'DONE';

/**
 * One step of the acquisition machine
 */
export type AcquisitionStep =
  | { state: 'TRY_CACHE' }
  | { state: 'TRY_LIVE' }
  | { state: 'FALLBACK' }
  | { state: 'DONE'; series: Series };

/**
 * Tide service dependencies
 * The cache store is owned by the service for one invocation.
 */
export interface TideServiceDependencies {
  cache: CacheStore;
  client: StationClient;
  logger: Logger;
  datum: DatumConfig;
  stationId: string;
  /** Override of the offline model parameters */
  fallbackModel?: FallbackModelConfig;
}

/**
 * Single entry point for "the series to show now"
 */
export interface TideService {
  /** Always resolves with a valid series; acquisition failures are absorbed */
  getCurrentSeries(now: Instant): Promise<Series>;
  /** States visited by the last call */
  getLastTrace(): AcquisitionState[];
}
