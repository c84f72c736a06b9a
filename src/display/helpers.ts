/**
 * Coordinate mapping shared by every sink
 */

import { CHART_CONSTANTS, SERIES_CONSTANTS } from '@utils/constants';
import { clamp } from '@utils/number';

import type { HeightRange, Point, ScaleTick, SurfaceGeometry, TextLabel, VerticalLayout } from './types';
import type { Sample } from '@core/series';

/**
 * Height extent of a series
 *
 * A flat series gets a range of 1.0 so the mapping never divides by zero.
 *
 * @param samples - Non-empty samples
 * @returns Min, max and effective range
 */
export function computeRange(samples: readonly Sample[]): HeightRange {
  let min = samples[0].heightFt;
  let max = samples[0].heightFt;
  for (let i = 1; i < samples.length; i++) {
    if (samples[i].heightFt < min) min = samples[i].heightFt;
    if (samples[i].heightFt > max) max = samples[i].heightFt;
  }
  const range = max === min ? 1.0 : max - min;
  return { min: min, max: max, range: range };
}

/**
 * Margins reserved around the curve
 *
 * One line on top for the readout; two below, the first holding the time
 * axis with its hour ticks and the second the axis labels.
 *
 * @param geometry - Surface geometry
 * @returns Vertical layout
 */
export function computeLayout(geometry: SurfaceGeometry): VerticalLayout {
  const line = geometry.lineHeight;
  return {
    topMargin: line,
    bottomMargin: 2 * line,
    usableHeight: geometry.height - 3 * line,
  };
}

/**
 * Row of the time axis, directly under the last usable row
 * @param layout - Vertical layout
 * @returns y of the axis
 */
export function axisRow(layout: VerticalLayout): number {
  return layout.topMargin + layout.usableHeight;
}

/**
 * Column of sample i
 * @param index - Sample index 0..144
 * @param width - Surface width
 * @returns x in [0, width - 1]
 */
export function xForIndex(index: number, width: number): number {
  return Math.round(index * (width - 1) / (SERIES_CONSTANTS.SAMPLE_COUNT - 1));
}

/**
 * Row of a height; the maximum lands on the first usable row, the minimum on the last
 *
 * @param heightFt - Height to place
 * @param range - Series extent
 * @param layout - Vertical layout
 * @returns y in [topMargin, topMargin + usableHeight - 1]
 */
export function yForHeight(heightFt: number, range: HeightRange, layout: VerticalLayout): number {
  const norm = (heightFt - range.min) / range.range;
  return Math.round(layout.topMargin + (1 - norm) * (layout.usableHeight - 1));
}

/**
 * Integer points of a line, endpoints included (Bresenham)
 *
 * @returns Points from (x0, y0) to (x1, y1)
 */
export function rasterizeLine(x0: number, y0: number, x1: number, y1: number): Point[] {
  const points: Point[] = [];
  const dx = Math.abs(x1 - x0);
  const dy = -Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let error = dx + dy;
  let x = x0;
  let y = y0;

  for (;;) {
    points.push({ x: x, y: y });
    if (x === x1 && y === y1) break;
    const e2 = 2 * error;
    if (e2 >= dy) {
      error += dy;
      x += sx;
    }
    if (e2 <= dx) {
      error += dx;
      y += sy;
    }
  }

  return points;
}

/**
 * Left edge of text centred on a column, kept on the surface
 *
 * @param text - Label text
 * @param centerX - Column to centre on
 * @param geometry - Surface geometry
 * @returns x of the first character
 */
export function centeredTextX(text: string, centerX: number, geometry: SurfaceGeometry): number {
  const textWidth = text.length * geometry.charWidth;
  const x = Math.round(centerX - textWidth / 2);
  return clamp(x, 0, Math.max(0, geometry.width - textWidth));
}

/**
 * Rows and values of the height scale ticks, top to bottom
 *
 * The ticks split the usable band evenly, so each value is the height that
 * yForHeight maps onto that row.
 *
 * @param range - Series extent
 * @param layout - Vertical layout
 * @returns One entry per tick
 */
export function scaleTicks(range: HeightRange, layout: VerticalLayout): ScaleTick[] {
  const steps = CHART_CONSTANTS.SCALE_TICKS - 1;
  const ticks: ScaleTick[] = [];
  for (let k = 0; k <= steps; k++) {
    ticks.push({
      y: Math.round(layout.topMargin + k * (layout.usableHeight - 1) / steps),
      heightFt: range.min + (steps - k) / steps * range.range,
    });
  }
  return ticks;
}

/**
 * Whether two labels would share any cell or pixel
 *
 * @param a - First label
 * @param b - Second label
 * @param geometry - Surface geometry (one line high, charWidth per character)
 * @returns True when the boxes intersect
 */
export function labelsOverlap(a: TextLabel, b: TextLabel, geometry: SurfaceGeometry): boolean {
  const aRight = a.x + a.text.length * geometry.charWidth;
  const bRight = b.x + b.text.length * geometry.charWidth;
  const apart = aRight <= b.x || bRight <= a.x ||
    a.y + geometry.lineHeight <= b.y || b.y + geometry.lineHeight <= a.y;
  return !apart;
}

/**
 * Height readout text
 * @param heightFt - Height in feet
 * @returns e.g. "4.2 ft"
 */
export function formatHeightLabel(heightFt: number): string {
  return heightFt.toFixed(1) + ' ft';
}

/**
 * Height scale label; the extremes are marked Hi and Lo
 *
 * @param heightFt - Tick value
 * @param position - Which end of the scale the tick sits on, if any
 * @returns e.g. "Hi 9.2", "4.8", "Lo 0.3"
 */
export function formatScaleLabel(heightFt: number, position: 'top' | 'bottom' | 'inner'): string {
  const value = heightFt.toFixed(1);
  if (position === 'top') return 'Hi ' + value;
  if (position === 'bottom') return 'Lo ' + value;
  return value;
}
