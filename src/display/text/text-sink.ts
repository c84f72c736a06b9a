/**
 * Character grid sink
 *
 * Terminal preview of the same render command the bitmap gets: one cell per
 * "pixel", line-drawing glyphs chosen by slope, '●' for the marker.
 */

import { isInteger } from '@utils/number';
import { PrimitiveError } from '$types/errors';

import { rasterizeLine } from '../helpers';

import type { TextSink, TextSinkConfig } from './types';

export const GLYPHS = {
  horizontal: '─',
  vertical: '│',
  rising: '╱',
  falling: '╲',
  marker: '●',
  blank: ' ',
} as const;

/**
 * Glyph for a segment by its slope (y grows downwards)
 *
 * @param dx - x1 - x0
 * @param dy - y1 - y0
 * @returns Line-drawing character
 */
export function lineGlyph(dx: number, dy: number): string {
  const ax = Math.abs(dx);
  const ay = Math.abs(dy);
  if (ax === 0 && ay === 0) return GLYPHS.horizontal;
  if (ax > 2 * ay) return GLYPHS.horizontal;
  if (ay > 2 * ax) return GLYPHS.vertical;
  return (dx > 0) === (dy < 0) ? GLYPHS.rising : GLYPHS.falling;
}

/**
 * Create a text grid sink
 *
 * @param config - Grid size and line writer
 * @returns Text sink
 */
export function createTextSink(config: TextSinkConfig): TextSink {
  const columns = config.columns;
  const rows = config.rows;
  const grid: string[][] = [];
  for (let r = 0; r < rows; r++) {
    grid.push(new Array<string>(columns).fill(GLYPHS.blank));
  }

  const geometry = {
    width: columns,
    height: rows,
    lineHeight: 1,
    charWidth: 1,
  };

  function checkCell(what: string, x: number, y: number): void {
    if (!isInteger(x) || !isInteger(y) || x < 0 || x >= columns || y < 0 || y >= rows) {
      throw new PrimitiveError(what + ' (' + x + ', ' + y + ') is outside the ' + columns + 'x' + rows + ' grid');
    }
  }

  function put(x: number, y: number, ch: string): void {
    if (x >= 0 && x < columns && y >= 0 && y < rows) {
      grid[y][x] = ch;
    }
  }

  function drawLine(x0: number, y0: number, x1: number, y1: number): void {
    checkCell('line start', x0, y0);
    checkCell('line end', x1, y1);
    const glyph = lineGlyph(x1 - x0, y1 - y0);
    const points = rasterizeLine(x0, y0, x1, y1);
    for (let i = 0; i < points.length; i++) {
      put(points[i].x, points[i].y, glyph);
    }
  }

  function drawPoint(x: number, y: number): void {
    checkCell('marker', x, y);
    put(x, y, GLYPHS.marker);
  }

  function drawText(x: number, y: number, text: string): void {
    checkCell('text', x, y);
    for (let i = 0; i < text.length; i++) {
      put(x + i, y, text.charAt(i));
    }
  }

  function getLines(): string[] {
    return grid.map(function(row) {
      return row.join('').replace(/\s+$/, '');
    });
  }

  function flush(): void {
    const lines = getLines();
    for (let i = 0; i < lines.length; i++) {
      config.writer(lines[i]);
    }
  }

  return {
    geometry: geometry,
    drawLine: drawLine,
    drawPoint: drawPoint,
    drawText: drawText,
    flush: flush,
    getLines: getLines
  };
}
