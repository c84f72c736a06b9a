/**
 * Tide service
 *
 * Decides which series to show: a fresh cache entry, else one live fetch
 * resampled to the canonical grid, else the offline model. Runs as an explicit
 * state machine TRY_CACHE -> TRY_LIVE -> FALLBACK -> DONE and always ends in
 * DONE with exactly one series.
 */

import { generateFallbackSeries } from '@core/fallback';
import { resampleSeries } from '@core/resampler';
import { applyDatum, nowSample } from '@core/series';
import { fmtHeight } from '@logging';

import { describeLiveFailure } from './helpers';

import type { AcquisitionState, AcquisitionStep, TideService, TideServiceDependencies } from './types';
import type { Series } from '@core/series';
import type { Instant } from '$types/common';

type PendingStep = Exclude<AcquisitionStep, { state: 'DONE' }>;

/**
 * Create a tide service
 *
 * @param deps - Cache, station client, logger and datum settings
 * @returns Tide service
 */
export function createTideService(deps: TideServiceDependencies): TideService {
  const logger = deps.logger;
  let lastTrace: AcquisitionState[] = [];

  function tryCache(now: Instant): AcquisitionStep {
    const cached = deps.cache.get(now);
    if (cached === null) {
      return { state: 'TRY_LIVE' };
    }
    logger.info('Using cached series');
    return { state: 'DONE', series: cached };
  }

  async function tryLive(now: Instant): Promise<AcquisitionStep> {
    const fetched = await deps.client.fetchSamples(deps.stationId, now);
    if (!fetched.ok) {
      logger.warning(describeLiveFailure(fetched.error));
      return { state: 'FALLBACK' };
    }

    const resampled = resampleSeries(fetched.value, now);
    if (!resampled.ok) {
      logger.warning(describeLiveFailure(resampled.error));
      return { state: 'FALLBACK' };
    }

    const series: Series = { samples: applyDatum(resampled.value, deps.datum), source: 'live' };

    const stored = deps.cache.put(series, now);
    if (!stored.ok) {
      logger.warning('Cache write failed: ' + stored.error);
    }

    logger.info('Fetched live series for station ' + deps.stationId + ' (' + fetched.value.length + ' predictions)');
    return { state: 'DONE', series: series };
  }

  function fallback(now: Instant): AcquisitionStep {
    const synthetic = generateFallbackSeries(now, deps.fallbackModel);
    logger.info('Using offline tide model');
    return {
      state: 'DONE',
      series: { samples: applyDatum(synthetic.samples, deps.datum), source: 'fallback' },
    };
  }

  async function advance(step: PendingStep, now: Instant): Promise<AcquisitionStep> {
    switch (step.state) {
      case 'TRY_CACHE':
        return tryCache(now);
      case 'TRY_LIVE':
        return tryLive(now);
      case 'FALLBACK':
        return fallback(now);
    }
  }

  async function getCurrentSeries(now: Instant): Promise<Series> {
    const trace: AcquisitionState[] = [];
    let step: AcquisitionStep = { state: 'TRY_CACHE' };

    while (step.state !== 'DONE') {
      trace.push(step.state);
      step = await advance(step, now);
    }
    trace.push(step.state);
    lastTrace = trace;

    logger.debug('Acquisition ' + trace.join(' -> ') + ', source=' + step.series.source +
      ', now=' + fmtHeight(nowSample(step.series).heightFt));

    return step.series;
  }

  function getLastTrace(): AcquisitionState[] {
    return lastTrace.slice();
  }

  return {
    getCurrentSeries: getCurrentSeries,
    getLastTrace: getLastTrace,
  };
}
