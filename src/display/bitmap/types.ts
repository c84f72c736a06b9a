/**
 * Bitmap sink type definitions
 */

import type { PixelSink } from '../types';

/**
 * Packed 1-bit frame
 * Rows are padded to whole bytes, most significant bit first, bit set = ink.
 */
export interface Frame {
  width: number;
  height: number;
  /** Bytes per row */
  stride: number;
  data: Uint8Array;
}

/**
 * Hand-off point for finished frames (panel driver, file writer)
 */
export interface FrameDriver {
  write(frame: Frame): void;
}

/**
 * Bitmap sink configuration
 */
export interface BitmapSinkConfig {
  width: number;
  height: number;
  /** Text line height in pixels; the 5x7 font is scaled to fit */
  fontHeight: number;
  /** Line thickness, centred on the path */
  strokePx: number;
  /** Radius of the filled "now" marker */
  markerRadiusPx: number;
  driver: FrameDriver;
}

/**
 * Bitmap sink with read access for inspection
 */
export interface BitmapSink extends PixelSink {
  getPixel(x: number, y: number): boolean;
  /** Copy of the current frame */
  getFrame(): Frame;
}
