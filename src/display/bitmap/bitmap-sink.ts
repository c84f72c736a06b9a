/**
 * Monochrome bitmap sink
 *
 * Draws into a packed 1-bit buffer and hands it to a FrameDriver on flush.
 */

import { isInteger } from '@utils/number';
import { PrimitiveError } from '$types/errors';

import { rasterizeLine } from '../helpers';

import { charAdvance, fontScale, glyphRows } from './font';

import type { BitmapSink, BitmapSinkConfig, Frame } from './types';

/**
 * Create a bitmap sink
 *
 * @param config - Surface size, stroke and font settings, frame driver
 * @returns Bitmap sink
 *
 * @example
 * ```typescript
 * const sink = createBitmapSink({
 *   width: 400, height: 300, fontHeight: 20,
 *   strokePx: 2, markerRadiusPx: 3,
 *   driver: createPbmDriver('/tmp/tide.pbm')
 * });
 * drawSeries(series, sink);
 * ```
 */
export function createBitmapSink(config: BitmapSinkConfig): BitmapSink {
  const width = config.width;
  const height = config.height;
  const stride = Math.ceil(width / 8);
  const data = new Uint8Array(stride * height);
  const scale = fontScale(config.fontHeight);

  const geometry = {
    width: width,
    height: height,
    lineHeight: config.fontHeight,
    charWidth: charAdvance(scale),
  };

  function inBounds(x: number, y: number): boolean {
    return x >= 0 && x < width && y >= 0 && y < height;
  }

  function checkPoint(what: string, x: number, y: number): void {
    if (!isInteger(x) || !isInteger(y) || !inBounds(x, y)) {
      throw new PrimitiveError(what + ' (' + x + ', ' + y + ') is outside the ' + width + 'x' + height + ' surface');
    }
  }

  // Clipped: brushes and glyphs may overhang the edge
  function setPixel(x: number, y: number): void {
    if (!inBounds(x, y)) return;
    data[y * stride + (x >> 3)] |= 0x80 >> (x & 7);
  }

  function getPixel(x: number, y: number): boolean {
    if (!inBounds(x, y)) return false;
    return (data[y * stride + (x >> 3)] & (0x80 >> (x & 7))) !== 0;
  }

  function fillBlock(x: number, y: number, size: number): void {
    for (let dy = 0; dy < size; dy++) {
      for (let dx = 0; dx < size; dx++) {
        setPixel(x + dx, y + dy);
      }
    }
  }

  // Square brush centred on the path; an even stroke's extra row and column
  // fall above and to the left
  function stamp(x: number, y: number, size: number): void {
    const offset = Math.floor(size / 2);
    fillBlock(x - offset, y - offset, size);
  }

  function drawLine(x0: number, y0: number, x1: number, y1: number): void {
    checkPoint('line start', x0, y0);
    checkPoint('line end', x1, y1);
    const points = rasterizeLine(x0, y0, x1, y1);
    for (let i = 0; i < points.length; i++) {
      stamp(points[i].x, points[i].y, config.strokePx);
    }
  }

  function drawPoint(x: number, y: number): void {
    checkPoint('marker', x, y);
    const r = config.markerRadiusPx;
    for (let dy = -r; dy <= r; dy++) {
      for (let dx = -r; dx <= r; dx++) {
        if (dx * dx + dy * dy <= r * r) {
          setPixel(x + dx, y + dy);
        }
      }
    }
  }

  function drawText(x: number, y: number, text: string): void {
    checkPoint('text', x, y);
    for (let i = 0; i < text.length; i++) {
      const rows = glyphRows(text.charAt(i));
      const originX = x + i * geometry.charWidth;
      for (let row = 0; row < rows.length; row++) {
        for (let col = 0; col < rows[row].length; col++) {
          if (rows[row].charAt(col) === '#') {
            fillBlock(originX + col * scale, y + row * scale, scale);
          }
        }
      }
    }
  }

  function getFrame(): Frame {
    return { width: width, height: height, stride: stride, data: data.slice() };
  }

  function flush(): void {
    config.driver.write(getFrame());
  }

  return {
    geometry: geometry,
    drawLine: drawLine,
    drawPoint: drawPoint,
    drawText: drawText,
    flush: flush,
    getPixel: getPixel,
    getFrame: getFrame
  };
}
