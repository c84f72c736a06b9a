/**
 * Command line entry
 *
 * One invocation draws one frame: resolve the series (cache, live fetch or
 * offline model), render it to the panel or the terminal, report, exit.
 */

import chalk from 'chalk';
import { Command } from 'commander';

import { createBitmapSink, createPbmDriver, createTextSink, drawSeries } from '@display';
import { nowSample } from '@core/series';
import { fmtHeight } from '@logging';
import { parseIsoInstant } from '@utils/time';
import { ConfigValidationError } from '$types/errors';

import { buildConfig, loadUserConfig } from './config';
import { initializeApp } from './init';

import type { App, CliOptions, RunReport, RuntimeIO } from './types';
import type { PixelSink } from '@display';
import type { Instant, TideConfig, TideUserConfig } from '$types';

export const EXIT_CODES = {
  OK: 0,
  RENDER_FAILED: 1,
  INVALID_CONFIG: 2
} as const;

/** Frame hand-off file read by the panel refresher when --pbm is not given */
export const DEFAULT_FRAME_PATH = '/tmp/tide_display.pbm';

type Env = Record<string, string | undefined>;

/**
 * Apply --station and --cache on top of the environment configuration
 * @param user - Configuration from defaults and environment
 * @param options - Parsed command line options
 * @returns New user configuration
 */
export function applyCliOverrides(user: TideUserConfig, options: CliOptions): TideUserConfig {
  return Object.assign({}, user, {
    STATION_ID: options.station !== undefined ? options.station : user.STATION_ID,
    CACHE_PATH: options.cache !== undefined ? options.cache : user.CACHE_PATH
  });
}

/**
 * Resolve the reference instant
 * @param options - Parsed command line options
 * @param clock - Wall clock
 * @returns --now when given, else the clock
 * @throws ConfigValidationError when --now is not a date-time
 */
export function resolveNow(options: CliOptions, clock: () => Instant): Instant {
  if (options.now === undefined) {
    return clock();
  }

  const instant = parseIsoInstant(options.now);
  if (instant === null) {
    throw new ConfigValidationError('Invalid command line', [
      '[--now]: expected an ISO-8601 date-time (got "' + options.now + '")'
    ]);
  }
  return instant;
}

/**
 * Pick the pixel sink for this run
 *
 * --stdout selects the text grid; otherwise the bitmap is flushed to the
 * --pbm file, the injected frame driver, or the default hand-off file.
 *
 * @returns Sink and a description of where it writes
 */
export function createSink(config: TideConfig, options: CliOptions, io: RuntimeIO): { sink: PixelSink; target: string } {
  if (options.stdout) {
    return {
      sink: createTextSink({ columns: config.TEXT_COLUMNS, rows: config.TEXT_ROWS, writer: io.stdout }),
      target: 'stdout'
    };
  }

  let target = DEFAULT_FRAME_PATH;
  let driver = io.frameDriver;
  if (options.pbm !== undefined) {
    target = options.pbm;
    driver = createPbmDriver(options.pbm);
  } else if (driver) {
    target = 'panel';
  } else {
    driver = createPbmDriver(DEFAULT_FRAME_PATH);
  }

  return {
    sink: createBitmapSink({
      width: config.DISPLAY_WIDTH,
      height: config.DISPLAY_HEIGHT,
      fontHeight: config.FONT_HEIGHT,
      strokePx: config.CURVE_STROKE_PX,
      markerRadiusPx: config.MARKER_RADIUS_PX,
      driver: driver
    }),
    target: target
  };
}

/**
 * Run one display refresh
 *
 * @param options - Parsed command line options
 * @param env - Environment (process.env after dotenv)
 * @param io - Process boundary
 * @returns Report with the exit code (0 ok, 1 render failed, 2 invalid configuration)
 */
export async function runDisplay(options: CliOptions, env: Env, io: RuntimeIO): Promise<RunReport> {
  let app: App;
  let now: Instant;

  try {
    const config = buildConfig(applyCliOverrides(loadUserConfig(env), options));
    now = resolveNow(options, io.clock);
    app = await initializeApp(config, io);
  } catch (error) {
    if (!(error instanceof ConfigValidationError)) {
      throw error;
    }

    io.stderr('INIT FAIL: ' + error.message);
    for (let i = 0; i < error.details.length; i++) {
      io.stderr('  ' + error.details[i]);
    }

    return {
      exitCode: EXIT_CODES.INVALID_CONFIG,
      stationId: options.station !== undefined ? options.station : '',
      cachePath: options.cache !== undefined ? options.cache : '',
      source: null,
      heightFt: null,
      problems: error.details
    };
  }

  const config = app.config;
  const logger = app.logger;
  const series = await app.service.getCurrentSeries(now);
  const heightFt = nowSample(series).heightFt;

  const output = createSink(config, options, io);
  const outcome = drawSeries(series, output.sink);

  const report: RunReport = {
    exitCode: EXIT_CODES.OK,
    stationId: config.STATION_ID,
    cachePath: config.CACHE_PATH,
    source: series.source,
    heightFt: heightFt,
    problems: []
  };

  if (!outcome.ok) {
    logger.critical('Render failed: ' + outcome.error.message);
    for (let i = 0; i < outcome.error.failures.length; i++) {
      logger.critical('  ' + outcome.error.failures[i]);
    }
    report.exitCode = EXIT_CODES.RENDER_FAILED;
    report.problems = outcome.error.failures;
    return report;
  }

  logger.info('Rendered ' + series.source + ' series to ' + output.target + ', now ' + fmtHeight(heightFt));
  return report;
}

/**
 * Format the end-of-run summary
 * @param report - Run outcome
 * @param useColor - Colour the lines
 * @returns Summary lines
 */
export function formatSummary(report: RunReport, useColor: boolean): string[] {
  const paint = function(style: (text: string) => string, text: string): string {
    return useColor ? style(text) : text;
  };

  if (report.exitCode === EXIT_CODES.INVALID_CONFIG) {
    return [paint(chalk.red, '[TIDE]    ✗ Invalid configuration')];
  }

  if (report.exitCode === EXIT_CODES.RENDER_FAILED) {
    return [paint(chalk.red, '[TIDE]    ✗ Render failed (' + report.problems.length + ' problem(s))')];
  }

  const height = report.heightFt !== null ? fmtHeight(report.heightFt) : 'n/a';
  const headline = report.source === 'fallback'
    ? paint(chalk.yellow, '[TIDE]    ✓ Rendered fallback series (offline model)')
    : paint(chalk.green, '[TIDE]    ✓ Rendered ' + report.source + ' series, ' + height + ' now');

  return [
    headline,
    paint(chalk.gray, '          Station: ' + report.stationId),
    paint(chalk.gray, '          Cache:   ' + report.cachePath)
  ];
}

/**
 * Build the commander program
 *
 * @param io - Process boundary
 * @param env - Environment
 * @param onExit - Receives the exit code once the run finished
 * @returns Program ready for parseAsync
 */
export function createProgram(io: RuntimeIO, env: Env, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('tide-display')
    .description('Draw the 24 hour tide curve for a NOAA station')
    .option('--stdout', 'Render a text grid to stdout instead of the bitmap')
    .option('--pbm <file>', 'Write the bitmap frame to a PBM file')
    .option('--cache <path>', 'Cache file path (overrides TIDE_CACHE_PATH)')
    .option('--station <id>', 'NOAA station id (overrides TIDE_STATION_ID)')
    .option('--now <iso>', 'Reference instant instead of the clock')
    .option('-q, --quiet', 'No summary (for scripted use)')
    .action(async function() {
      const options = program.opts<CliOptions>();
      const report = await runDisplay(options, env, io);

      if (!options.quiet) {
        const lines = formatSummary(report, io.useColor);
        for (let i = 0; i < lines.length; i++) {
          io.stderr(lines[i]);
        }
      }

      onExit(report.exitCode);
    });

  return program;
}
