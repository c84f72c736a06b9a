/**
 * Tide curve renderer
 *
 * Maps a series onto a surface once (buildRenderCommand) and replays the
 * command through any PixelSink (drawSeries): guides, then the curve, the
 * marker and the labels. Every primitive is attempted; failures are
 * collected into a single RenderError and the surface is not flushed.
 */

import { nowSample, validateSeries } from '@core/series';
import { CHART_CONSTANTS, SERIES_CONSTANTS } from '@utils/constants';
import { clamp } from '@utils/number';
import { err, ok } from '$types/common';

import {
  axisRow,
  centeredTextX,
  computeLayout,
  computeRange,
  formatHeightLabel,
  formatScaleLabel,
  labelsOverlap,
  scaleTicks,
  xForIndex,
  yForHeight
} from './helpers';

import type {
  PixelSink,
  RenderCommand,
  RenderOutcome,
  ScaleTick,
  Segment,
  SurfaceGeometry,
  TextLabel,
  VerticalLayout
} from './types';
import type { Series } from '@core/series';
import type { Result } from '$types/common';
import type { RenderError } from '$types/errors';

export const OFFLINE_LABEL = 'OFFLINE';
export const AXIS_LABELS = { past: '-12h', now: 'Now', future: '+12h' } as const;
export const HOUR_TICK_LABEL = '|';

function renderError(message: string, failures: string[]): RenderError {
  return { kind: 'render', message: message, failures: failures };
}

/**
 * Axes, scale ticks and the dashed vertical line through "now"
 *
 * Dashes are at least two rows long so a character grid still draws them
 * as vertical strokes.
 */
function buildGuides(nowX: number, ticks: ScaleTick[], layout: VerticalLayout, geometry: SurfaceGeometry): Segment[] {
  const top = layout.topMargin;
  const axisY = axisRow(layout);
  const guides: Segment[] = [
    { from: { x: 0, y: top }, to: { x: 0, y: axisY } },
    { from: { x: 0, y: axisY }, to: { x: geometry.width - 1, y: axisY } },
  ];

  for (let k = 0; k < ticks.length; k++) {
    guides.push({ from: { x: 0, y: ticks[k].y }, to: { x: geometry.charWidth, y: ticks[k].y } });
  }

  const dash = Math.max(2, Math.round(geometry.lineHeight / 5));
  for (let y = top; y + 1 < axisY; y += 2 * dash) {
    guides.push({ from: { x: nowX, y: y }, to: { x: nowX, y: Math.min(y + dash - 1, axisY - 1) } });
  }

  return guides;
}

/**
 * Height scale labels beside their ticks and '|' marks on every hour
 *
 * Kept only where they clear everything placed before them.
 */
function buildOptionalLabels(ticks: ScaleTick[], layout: VerticalLayout, geometry: SurfaceGeometry): TextLabel[] {
  const labels: TextLabel[] = [];
  const axisY = axisRow(layout);
  const lowestTextY = axisY - geometry.lineHeight;

  for (let k = 0; k < ticks.length && lowestTextY >= layout.topMargin; k++) {
    const position = k === 0 ? 'top' : (k === ticks.length - 1 ? 'bottom' : 'inner');
    labels.push({
      x: 2 * geometry.charWidth,
      y: clamp(ticks[k].y - Math.floor(geometry.lineHeight / 2), layout.topMargin, lowestTextY),
      text: formatScaleLabel(ticks[k].heightFt, position),
    });
  }

  for (let i = 0; i < SERIES_CONSTANTS.SAMPLE_COUNT; i += CHART_CONSTANTS.SAMPLES_PER_HOUR) {
    labels.push({
      x: centeredTextX(HOUR_TICK_LABEL, xForIndex(i, geometry.width), geometry),
      y: axisY,
      text: HOUR_TICK_LABEL,
    });
  }

  return labels;
}

/**
 * Compute guides, segments, marker and labels for a series on a surface
 *
 * @param series - Series to draw
 * @param geometry - Target surface
 * @returns Render command, or a RenderError when the series or surface is unusable
 */
export function buildRenderCommand(series: Series, geometry: SurfaceGeometry): Result<RenderCommand, RenderError> {
  const violation = validateSeries(series.samples);
  if (violation !== null) {
    return err(renderError('invalid series: ' + violation, [violation]));
  }

  const surface = 'surface ' + geometry.width + 'x' + geometry.height;
  const layout = computeLayout(geometry);
  if (geometry.width < 2 || layout.usableHeight < 2) {
    const detail = surface + ' leaves no room for the curve';
    return err(renderError(detail, [detail]));
  }
  if (geometry.width < CHART_CONSTANTS.MIN_LABEL_COLUMNS * geometry.charWidth) {
    const detail = surface + ' is narrower than ' + CHART_CONSTANTS.MIN_LABEL_COLUMNS + ' characters';
    return err(renderError(detail, [detail]));
  }

  const range = computeRange(series.samples);
  const points = series.samples.map(function(s, i) {
    return { x: xForIndex(i, geometry.width), y: yForHeight(s.heightFt, range, layout) };
  });

  const segments: Segment[] = [];
  for (let i = 1; i < points.length; i++) {
    segments.push({ from: points[i - 1], to: points[i] });
  }

  const marker = points[SERIES_CONSTANTS.NOW_INDEX];
  const ticks = scaleTicks(range, layout);
  const cw = geometry.charWidth;
  const heightText = formatHeightLabel(nowSample(series).heightFt);
  const labelsY = geometry.height - geometry.lineHeight;

  const offline: TextLabel | null = series.source === 'fallback'
    ? { x: Math.max(0, geometry.width - OFFLINE_LABEL.length * cw), y: 0, text: OFFLINE_LABEL }
    : null;

  // Slide the readout left of OFFLINE, one character apart, when they meet
  let readoutX = centeredTextX(heightText, marker.x, geometry);
  if (offline !== null && readoutX + heightText.length * cw > offline.x - cw) {
    readoutX = Math.max(0, offline.x - cw - heightText.length * cw);
  }

  const labels: TextLabel[] = [
    { x: readoutX, y: 0, text: heightText },
    { x: 0, y: labelsY, text: AXIS_LABELS.past },
    { x: centeredTextX(AXIS_LABELS.now, marker.x, geometry), y: labelsY, text: AXIS_LABELS.now },
    { x: Math.max(0, geometry.width - AXIS_LABELS.future.length * cw), y: labelsY, text: AXIS_LABELS.future },
  ];
  if (offline !== null) {
    labels.push(offline);
  }

  const optional = buildOptionalLabels(ticks, layout, geometry);
  for (let i = 0; i < optional.length; i++) {
    const candidate = optional[i];
    const clear = labels.every(function(placed) {
      return !labelsOverlap(candidate, placed, geometry);
    });
    if (clear) {
      labels.push(candidate);
    }
  }

  return ok({
    guides: buildGuides(marker.x, ticks, layout, geometry),
    segments: segments,
    marker: marker,
    labels: labels,
  });
}

/**
 * Draw a series on a sink and flush it
 *
 * @param series - Series to draw
 * @param sink - Output surface
 * @returns The command drawn, or the collected failures
 */
export function drawSeries(series: Series, sink: PixelSink): RenderOutcome {
  const built = buildRenderCommand(series, sink.geometry);
  if (!built.ok) {
    return built;
  }
  const command = built.value;
  const failures: string[] = [];

  function attempt(what: string, draw: () => void): void {
    try {
      draw();
    } catch (error) {
      failures.push(what + ': ' + (error instanceof Error ? error.message : String(error)));
    }
  }

  for (let i = 0; i < command.guides.length; i++) {
    const g = command.guides[i];
    attempt('guide ' + i, function() {
      sink.drawLine(g.from.x, g.from.y, g.to.x, g.to.y);
    });
  }

  for (let i = 0; i < command.segments.length; i++) {
    const s = command.segments[i];
    attempt('segment ' + i, function() {
      sink.drawLine(s.from.x, s.from.y, s.to.x, s.to.y);
    });
  }

  attempt('marker', function() {
    sink.drawPoint(command.marker.x, command.marker.y);
  });

  for (let i = 0; i < command.labels.length; i++) {
    const label = command.labels[i];
    attempt('label "' + label.text + '"', function() {
      sink.drawText(label.x, label.y, label.text);
    });
  }

  if (failures.length > 0) {
    return err(renderError(failures.length + ' drawing primitive(s) failed', failures));
  }

  try {
    sink.flush();
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return err(renderError('flush failed', [detail]));
  }

  return ok(command);
}
