/**
 * Application initialization
 */

import { createCacheStore } from '@hardware/cache';
import { createStationClient } from '@hardware/station';
import { createConsoleSink, createFileSink, createLogger, toLogLevel } from '@logging';
import { createTideService } from '@system/tide-service';
import { TIME_CONSTANTS } from '@utils/constants';
import { validateConfig } from '@validation';
import { ConfigValidationError } from '$types/errors';

import type { App, RuntimeIO } from './types';
import type { InitMessage, SinkWithLevel } from '@logging';
import type { TideConfig } from '$types';

/**
 * Validate the configuration and wire logger, cache, station client and tide service
 *
 * @param config - Complete configuration
 * @param io - Process boundary
 * @param onReady - Called once the log sinks are initialized
 * @throws ConfigValidationError listing every invalid field
 */
export function initialize(config: TideConfig, io: RuntimeIO, onReady: (app: App) => void): void {
  const validation = validateConfig(config);

  if (!validation.valid) {
    throw new ConfigValidationError(
      'Invalid configuration',
      validation.errors.map(function(e) {
        return '[' + e.field + ']: ' + e.message;
      })
    );
  }

  // Setup logging
  const consoleLevel = toLogLevel(config.LOG_LEVEL, config.LOG_LEVELS.INFO);
  const sinks: SinkWithLevel[] = [
    { sink: createConsoleSink({ error: io.stderr }, { useColor: io.useColor }), minLevel: consoleLevel }
  ];
  if (config.LOG_FILE !== '') {
    sinks.push({
      sink: createFileSink({ path: config.LOG_FILE, timeSource: io.clock }),
      minLevel: config.LOG_LEVELS.DEBUG
    });
  }

  const logger = createLogger({
    level: sinks.length > 1 ? config.LOG_LEVELS.DEBUG : consoleLevel
  }, {
    sinks: sinks,
    onSinkError: io.stderr
  }, config.LOG_LEVELS);

  const cache = createCacheStore({
    path: config.CACHE_PATH,
    ttlMs: config.CACHE_TTL_MIN * TIME_CONSTANTS.MS_PER_MINUTE,
    onMiss: function(reason, detail) {
      logger.debug('Cache miss (' + reason + '): ' + detail);
    }
  });

  const client = createStationClient({
    baseUrl: config.NOAA_BASE_URL,
    application: config.NOAA_APPLICATION,
    timeoutMs: config.FETCH_TIMEOUT_MS,
    minSamples: config.MIN_RAW_SAMPLES,
    fetchApi: io.fetchApi
  });

  const service = createTideService({
    cache: cache,
    client: client,
    logger: logger,
    datum: { showMsl: config.SHOW_MSL, mslOffsetFt: config.MSL_OFFSET_FT },
    stationId: config.STATION_ID
  });

  const app: App = { config: config, logger: logger, service: service };

  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    logger.info('Tide display: station ' + config.STATION_ID +
      (config.STATION_NAME !== '' ? ' (' + config.STATION_NAME + ')' : '') +
      ', datum ' + (config.SHOW_MSL ? 'MSL' : 'MLLW'));

    for (let i = 0; i < messages.length; i++) {
      if (!messages[i].success) {
        logger.warning(messages[i].message);
      }
    }

    for (let i = 0; i < validation.warnings.length; i++) {
      logger.warning('[' + validation.warnings[i].field + ']: ' + validation.warnings[i].message);
    }

    onReady(app);
  });
}

/**
 * Promise form of initialize
 * @param config - Complete configuration
 * @param io - Process boundary
 * @returns Initialized application
 */
export function initializeApp(config: TideConfig, io: RuntimeIO): Promise<App> {
  return new Promise(function(resolve) {
    initialize(config, io, resolve);
  });
}
