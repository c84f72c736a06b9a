/**
 * Tests for configuration module
 */

import CONFIG, { APP_CONSTANTS, buildConfig, loadUserConfig, USER_CONFIG } from './config';

import { validateConfig } from '@validation';
import { ConfigValidationError } from '$types/errors';

describe('Configuration', () => {
  describe('defaults', () => {
    it('should pass validation without warnings', () => {
      expect(validateConfig(CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('should merge user settings over the application constants', () => {
      expect(CONFIG.STATION_ID).toBe(USER_CONFIG.STATION_ID);
      expect(CONFIG.NOAA_BASE_URL).toBe(APP_CONSTANTS.NOAA_BASE_URL);
      expect(CONFIG.TIME_WINDOW_HOURS).toBe(APP_CONSTANTS.SUPPORTED_WINDOW_HOURS);
    });

    it('should give the curve room between the label lines', () => {
      expect(USER_CONFIG.DISPLAY_HEIGHT).toBeGreaterThanOrEqual(3 * USER_CONFIG.FONT_HEIGHT + 2);
      expect(USER_CONFIG.DISPLAY_WIDTH).toBeGreaterThanOrEqual(APP_CONSTANTS.FULL_RESOLUTION_COLUMNS);
    });
  });

  describe('loadUserConfig', () => {
    it('should return the defaults for an empty environment', () => {
      expect(loadUserConfig({})).toEqual(USER_CONFIG);
    });

    it('should read TIDE_* variables', () => {
      const user = loadUserConfig({
        TIDE_STATION_ID: ' 9414290 ',
        TIDE_STATION_NAME: 'San Francisco, CA',
        TIDE_SHOW_MSL: 'yes',
        TIDE_MSL_OFFSET_FT: '3.12',
        TIDE_CACHE_TTL_MIN: '15',
        TIDE_DISPLAY_WIDTH: '800',
        TIDE_LOG_FILE: '/var/log/tide.log',
      });

      expect(user.STATION_ID).toBe('9414290');
      expect(user.STATION_NAME).toBe('San Francisco, CA');
      expect(user.SHOW_MSL).toBe(true);
      expect(user.MSL_OFFSET_FT).toBe(3.12);
      expect(user.CACHE_TTL_MIN).toBe(15);
      expect(user.DISPLAY_WIDTH).toBe(800);
      expect(user.LOG_FILE).toBe('/var/log/tide.log');
      expect(user.DISPLAY_HEIGHT).toBe(USER_CONFIG.DISPLAY_HEIGHT);
    });

    it('should accept 0 and false as booleans', () => {
      expect(loadUserConfig({ TIDE_SHOW_MSL: '0' }, Object.assign({}, USER_CONFIG, { SHOW_MSL: true })).SHOW_MSL)
        .toBe(false);
      expect(loadUserConfig({ TIDE_SHOW_MSL: 'FALSE' }).SHOW_MSL).toBe(false);
    });

    it('should ignore blank numeric variables', () => {
      expect(loadUserConfig({ TIDE_CACHE_TTL_MIN: '  ' }).CACHE_TTL_MIN).toBe(USER_CONFIG.CACHE_TTL_MIN);
    });

    it('should leave unparseable numbers for the validator', () => {
      const config = buildConfig(loadUserConfig({ TIDE_FETCH_TIMEOUT_MS: 'ten' }));
      const result = validateConfig(config);

      expect(config.FETCH_TIMEOUT_MS).toBeNaN();
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.field)).toEqual(['FETCH_TIMEOUT_MS']);
    });

    it('should throw for an unparseable boolean', () => {
      expect(() => loadUserConfig({ TIDE_SHOW_MSL: 'sometimes' })).toThrow(ConfigValidationError);
    });
  });
});
