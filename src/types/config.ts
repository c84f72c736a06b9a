/**
 * Type definition for Tide Display configuration
 */

import type { LogLevels } from '@logging';

/**
 * User-configurable settings
 * Station, data freshness, display geometry and observability
 */
export interface TideUserConfig {
  // ───────── STATION ─────────
  readonly STATION_ID: string;
  readonly STATION_NAME: string;
  readonly MSL_OFFSET_FT: number;
  readonly SHOW_MSL: boolean;

  // ───────── DATA ─────────
  readonly TIME_WINDOW_HOURS: number;
  readonly CACHE_TTL_MIN: number;
  readonly CACHE_PATH: string;
  readonly FETCH_TIMEOUT_MS: number;

  // ───────── BITMAP DISPLAY ─────────
  readonly DISPLAY_WIDTH: number;
  readonly DISPLAY_HEIGHT: number;
  readonly FONT_HEIGHT: number;

  // ───────── TEXT PREVIEW ─────────
  readonly TEXT_COLUMNS: number;
  readonly TEXT_ROWS: number;

  // ───────── LOGGING ─────────
  readonly LOG_LEVEL: number;
  readonly LOG_FILE: string;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface TideAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── REMOTE SOURCE ─────────
  readonly NOAA_BASE_URL: string;
  readonly NOAA_APPLICATION: string;
  readonly MIN_RAW_SAMPLES: number;

  // ───────── RENDERING ─────────
  readonly CURVE_STROKE_PX: number;
  readonly MARKER_RADIUS_PX: number;

  // ───────── VALIDATION CONSTANTS ─────────
  readonly SUPPORTED_WINDOW_HOURS: number;
  readonly FULL_RESOLUTION_COLUMNS: number;
}

/**
 * Complete Tide Display configuration
 * Combines user config and app constants
 */
export type TideConfig = TideUserConfig & TideAppConstants;
