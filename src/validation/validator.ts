/**
 * Configuration validator
 *
 * Checks every user setting against its hard limits (errors) and recommended
 * ranges (warnings). All problems are collected; nothing stops at the first.
 */

import { charAdvance, fontScale } from '@display/bitmap';
import { CHART_CONSTANTS } from '@utils/constants';
import { isInteger } from '@utils/number';

import { createFieldChecker } from './helpers';

import type { Limits, ValidationResult } from './types';
import type { TideConfig } from '$types';

const STATION_ID_PATTERN = /^\d{7}$/;

const LIMITS = {
  MSL_OFFSET_FT: { min: -20, max: 20 },
  CACHE_TTL_MIN: { min: 1, max: 1440, recommended: { min: 1, max: 120 } },
  FETCH_TIMEOUT_MS: { min: 1000, max: 60000 },
  DISPLAY_WIDTH: { min: 40, max: 2000 },
  DISPLAY_HEIGHT: { min: 24, max: 2000 },
  FONT_HEIGHT: { min: 8, max: 64 },
  TEXT_COLUMNS: { min: 20, max: 400 },
  TEXT_ROWS: { min: 5, max: 200 }
} satisfies Record<string, Limits>;

/**
 * Validate a complete configuration
 *
 * @param config - User settings merged with application constants
 * @returns Validity plus every error and warning found
 */
export function validateConfig(config: TideConfig): ValidationResult {
  const check = createFieldChecker();
  const fullWidth = config.FULL_RESOLUTION_COLUMNS;

  // Station
  check.matches('STATION_ID', config.STATION_ID, STATION_ID_PATTERN, 'a 7 digit station number');
  check.number('MSL_OFFSET_FT', config.MSL_OFFSET_FT, LIMITS.MSL_OFFSET_FT);
  check.boolean('SHOW_MSL', config.SHOW_MSL);

  // Data
  if (config.TIME_WINDOW_HOURS !== config.SUPPORTED_WINDOW_HOURS) {
    check.fail(
      'TIME_WINDOW_HOURS',
      'TIME_WINDOW_HOURS must be ' + config.SUPPORTED_WINDOW_HOURS + ' (got ' + config.TIME_WINDOW_HOURS + ')'
    );
  }
  check.integer('CACHE_TTL_MIN', config.CACHE_TTL_MIN, LIMITS.CACHE_TTL_MIN);
  check.nonEmpty('CACHE_PATH', config.CACHE_PATH);
  check.integer('FETCH_TIMEOUT_MS', config.FETCH_TIMEOUT_MS, LIMITS.FETCH_TIMEOUT_MS);

  // Bitmap display
  check.integer('DISPLAY_WIDTH', config.DISPLAY_WIDTH, LIMITS.DISPLAY_WIDTH);
  check.integer('FONT_HEIGHT', config.FONT_HEIGHT, LIMITS.FONT_HEIGHT);
  check.integer('DISPLAY_HEIGHT', config.DISPLAY_HEIGHT, LIMITS.DISPLAY_HEIGHT);
  if (isInteger(config.FONT_HEIGHT)) {
    // Readout line, time axis line and label line, plus two rows of curve
    const minHeight = 3 * config.FONT_HEIGHT + 2;
    if (isInteger(config.DISPLAY_HEIGHT) && config.DISPLAY_HEIGHT < minHeight) {
      check.fail(
        'DISPLAY_HEIGHT',
        'DISPLAY_HEIGHT must be at least 3 x FONT_HEIGHT + 2 (' + minHeight + ') (got ' + config.DISPLAY_HEIGHT + ')'
      );
    }
    // OFFLINE and the readout share the top line; the axis labels share the bottom one
    const columns = CHART_CONSTANTS.MIN_LABEL_COLUMNS;
    const minWidth = columns * charAdvance(fontScale(config.FONT_HEIGHT));
    if (isInteger(config.DISPLAY_WIDTH) && config.DISPLAY_WIDTH < minWidth) {
      check.fail(
        'DISPLAY_WIDTH',
        'DISPLAY_WIDTH must fit ' + columns + ' characters at FONT_HEIGHT ' + config.FONT_HEIGHT +
          ' (' + minWidth + ' px) (got ' + config.DISPLAY_WIDTH + ')'
      );
    }
  }
  if (isInteger(config.DISPLAY_WIDTH) && config.DISPLAY_WIDTH < fullWidth) {
    check.warn(
      'DISPLAY_WIDTH',
      'DISPLAY_WIDTH below ' + fullWidth + ' px, samples will share columns (got ' + config.DISPLAY_WIDTH + ')'
    );
  }

  // Text preview
  check.integer('TEXT_COLUMNS', config.TEXT_COLUMNS, LIMITS.TEXT_COLUMNS);
  check.integer('TEXT_ROWS', config.TEXT_ROWS, LIMITS.TEXT_ROWS);
  if (isInteger(config.TEXT_COLUMNS) && config.TEXT_COLUMNS < fullWidth) {
    check.warn(
      'TEXT_COLUMNS',
      'TEXT_COLUMNS below ' + fullWidth + ', samples will share columns (got ' + config.TEXT_COLUMNS + ')'
    );
  }

  // Logging
  check.integer('LOG_LEVEL', config.LOG_LEVEL, { min: config.LOG_LEVELS.DEBUG, max: config.LOG_LEVELS.CRITICAL });

  return check.result();
}
