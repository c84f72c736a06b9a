import { ConfigValidationError } from '$types/errors';

import type { TideAppConstants, TideConfig, TideUserConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune: which station,
//   how fresh the data must be, panel geometry and logging.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<TideUserConfig> = {
  // STATION_ID
  //   Role: NOAA CO-OPS station whose predictions are shown.
  //   Critical: Exactly 7 digits.
  //   Recommended: The harmonic station nearest the display; 8418150 is Portland, ME.
  STATION_ID: '8418150',

  // STATION_NAME
  //   Role: Human-readable station name for logs and the run summary.
  //   Critical: Any string (may be empty).
  //   Recommended: The name NOAA lists for STATION_ID.
  STATION_NAME: 'Portland, ME',

  // MSL_OFFSET_FT
  //   Role: Height of mean sea level above MLLW at the station (ft).
  //   Critical: Finite, -20 to 20 ft.
  //   Recommended: The station datum sheet value; 4.9 ft for Portland.
  MSL_OFFSET_FT: 4.9,

  // SHOW_MSL
  //   Role: Show heights relative to mean sea level instead of MLLW.
  //   Critical: Boolean only.
  //   Recommended: false; MLLW matches charts and tide tables.
  SHOW_MSL: false,

  // TIME_WINDOW_HOURS
  //   Role: Hours shown either side of now.
  //   Critical: Must be 12 (the sample grid is fixed at 145 points).
  //   Recommended: 12.
  TIME_WINDOW_HOURS: 12,

  // CACHE_TTL_MIN
  //   Role: How long a fetched series is reused before fetching again (min).
  //   Critical: Integer 1–1440 min.
  //   Recommended: 15–120 min; predictions change slowly, 30 min is plenty.
  CACHE_TTL_MIN: 30,

  // CACHE_PATH
  //   Role: File holding the single cached series.
  //   Critical: Non-empty path; parent directory is created on write.
  //   Recommended: A tmpfs path on SD-card devices to limit writes.
  CACHE_PATH: '/tmp/tide_cache.json',

  // FETCH_TIMEOUT_MS
  //   Role: Timeout for the single HTTP request per run (ms).
  //   Critical: Integer 1000–60000 ms.
  //   Recommended: 5000–15000 ms; 10 s tolerates slow Wi-Fi.
  FETCH_TIMEOUT_MS: 10000,

  // DISPLAY_WIDTH / DISPLAY_HEIGHT
  //   Role: Bitmap panel size in pixels.
  //   Critical:
  //     DISPLAY_WIDTH: Integer 40–2000 px and at least 16 characters at FONT_HEIGHT
  //       (192 px at 20 px), so OFFLINE, the readout and the axis labels stay apart.
  //     DISPLAY_HEIGHT: Integer up to 2000 px and at least 3 × FONT_HEIGHT + 2.
  //   Recommended: The panel's native resolution; width ≥ 145 px gives one column per sample.
  DISPLAY_WIDTH: 400,
  DISPLAY_HEIGHT: 300,

  // FONT_HEIGHT
  //   Role: Height of a text line on the bitmap (px); the readout line above the curve,
  //     the time axis and label lines below it are one FONT_HEIGHT each.
  //   Critical: Integer 8–64 px.
  //   Recommended: 16–24 px; glyphs scale in steps of 8 px.
  FONT_HEIGHT: 20,

  // TEXT_COLUMNS / TEXT_ROWS
  //   Role: Size of the terminal preview grid.
  //   Critical:
  //     TEXT_COLUMNS: Integer 20–400.
  //     TEXT_ROWS: Integer 5–200.
  //   Recommended: 145 columns (one per sample) by 20–30 rows.
  TEXT_COLUMNS: 145,
  TEXT_ROWS: 26,

  // LOG_LEVEL
  //   Role: Minimum log severity (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 while diagnosing fetch problems.
  LOG_LEVEL: 1,

  // LOG_FILE
  //   Role: Append log lines to this file as well as stderr.
  //   Critical: String; empty disables the file sink.
  //   Recommended: Enabled on unattended displays so runs leave a history.
  LOG_FILE: '',
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<TideAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; LOG_LEVEL must use these.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // NOAA_BASE_URL / NOAA_APPLICATION
  //   Role: Predictions endpoint and the application name sent with requests.
  //   Critical: HTTPS URL of the CO-OPS datagetter.
  //   Recommended: Do not change.
  NOAA_BASE_URL: 'https://api.tidesandcurrents.noaa.gov/api/prod/datagetter',
  NOAA_APPLICATION: 'tide_display',

  // MIN_RAW_SAMPLES
  //   Role: Fewest predictions accepted from one response.
  //   Critical: Hourly data over 24 h gives 25 points.
  //   Recommended: Do not change.
  MIN_RAW_SAMPLES: 25,

  // CURVE_STROKE_PX / MARKER_RADIUS_PX
  //   Role: Curve thickness and "now" marker radius on the bitmap.
  //   Critical: Positive integers.
  //   Recommended: 2 px stroke, 3 px radius on 400x300 e-paper.
  CURVE_STROKE_PX: 2,
  MARKER_RADIUS_PX: 3,

  // ═══════════════════════════════════════════════════════════════
  // VALIDATION CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // SUPPORTED_WINDOW_HOURS
  //   Role: The only window the canonical grid supports (720 min each side).
  //   Critical: Must match the series grid.
  //   Recommended: Do not change.
  SUPPORTED_WINDOW_HOURS: 12,

  // FULL_RESOLUTION_COLUMNS
  //   Role: Surface width at which every sample gets its own column.
  //   Critical: Narrower surfaces still render, with a warning.
  //   Recommended: Do not change.
  FULL_RESOLUTION_COLUMNS: 145,
};

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT OVERRIDES
//   TIDE_* variables (optionally from .env) replace the defaults above.
// ─────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name];
  return value === undefined ? fallback : value.trim();
}

// Unparseable numbers become NaN and are rejected by validateConfig
function readNumber(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return Number(value.trim());
}

function readBoolean(env: Env, name: string, fallback: boolean, problems: string[]): boolean {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  problems.push('[' + name + ']: expected true or false (got "' + value + '")');
  return fallback;
}

/**
 * Overlay TIDE_* environment variables on a base configuration
 *
 * @param env - Environment (process.env after dotenv)
 * @param base - Defaults
 * @returns User configuration, not yet validated
 * @throws ConfigValidationError when a boolean variable cannot be parsed
 */
export function loadUserConfig(env: Env, base: Readonly<TideUserConfig> = USER_CONFIG): TideUserConfig {
  const problems: string[] = [];

  const config: TideUserConfig = {
    STATION_ID: readString(env, 'TIDE_STATION_ID', base.STATION_ID),
    STATION_NAME: readString(env, 'TIDE_STATION_NAME', base.STATION_NAME),
    MSL_OFFSET_FT: readNumber(env, 'TIDE_MSL_OFFSET_FT', base.MSL_OFFSET_FT),
    SHOW_MSL: readBoolean(env, 'TIDE_SHOW_MSL', base.SHOW_MSL, problems),
    TIME_WINDOW_HOURS: readNumber(env, 'TIDE_WINDOW_HOURS', base.TIME_WINDOW_HOURS),
    CACHE_TTL_MIN: readNumber(env, 'TIDE_CACHE_TTL_MIN', base.CACHE_TTL_MIN),
    CACHE_PATH: readString(env, 'TIDE_CACHE_PATH', base.CACHE_PATH),
    FETCH_TIMEOUT_MS: readNumber(env, 'TIDE_FETCH_TIMEOUT_MS', base.FETCH_TIMEOUT_MS),
    DISPLAY_WIDTH: readNumber(env, 'TIDE_DISPLAY_WIDTH', base.DISPLAY_WIDTH),
    DISPLAY_HEIGHT: readNumber(env, 'TIDE_DISPLAY_HEIGHT', base.DISPLAY_HEIGHT),
    FONT_HEIGHT: readNumber(env, 'TIDE_FONT_HEIGHT', base.FONT_HEIGHT),
    TEXT_COLUMNS: readNumber(env, 'TIDE_TEXT_COLUMNS', base.TEXT_COLUMNS),
    TEXT_ROWS: readNumber(env, 'TIDE_TEXT_ROWS', base.TEXT_ROWS),
    LOG_LEVEL: readNumber(env, 'TIDE_LOG_LEVEL', base.LOG_LEVEL),
    LOG_FILE: readString(env, 'TIDE_LOG_FILE', base.LOG_FILE),
  };

  if (problems.length > 0) {
    throw new ConfigValidationError('Invalid environment configuration', problems);
  }

  return config;
}

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────

/**
 * Merge user settings with the application constants
 * @param user - Validated user configuration
 * @returns Complete configuration
 */
export function buildConfig(user: TideUserConfig): TideConfig {
  return Object.assign({}, APP_CONSTANTS, user);
}

const CONFIG: TideConfig = buildConfig(USER_CONFIG);

export default CONFIG;
