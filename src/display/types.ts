/**
 * Display type definitions
 *
 * The renderer computes every coordinate once and replays the result onto a
 * PixelSink. Sinks only know how to put ink on their own surface.
 */

import type { Result } from '$types/common';
import type { RenderError } from '$types/errors';

// ═══════════════════════════════════════════════════════════════
// SURFACE
// ═══════════════════════════════════════════════════════════════

/**
 * Drawable surface dimensions, in the sink's own units
 * (pixels on the bitmap, character cells on the text grid)
 */
export interface SurfaceGeometry {
  width: number;
  height: number;
  /** Height of one line of text; the margins are whole lines */
  lineHeight: number;
  /** Advance of one character */
  charWidth: number;
}

/**
 * Output surface capability
 *
 * Drawing calls throw PrimitiveError when a primitive cannot be applied.
 * Coordinates are integers with the origin at the top left.
 */
export interface PixelSink {
  readonly geometry: SurfaceGeometry;
  /** Straight stroke between two points (curve, axes, ticks) */
  drawLine(x0: number, y0: number, x1: number, y1: number): void;
  /** Current-time marker centred on a point */
  drawPoint(x: number, y: number): void;
  /** Text anchored at its top-left corner */
  drawText(x: number, y: number, text: string): void;
  /** Hand the finished surface to its output */
  flush(): void;
}

// ═══════════════════════════════════════════════════════════════
// RENDER COMMAND
// ═══════════════════════════════════════════════════════════════

export interface Point {
  x: number;
  y: number;
}

export interface Segment {
  from: Point;
  to: Point;
}

export interface TextLabel {
  x: number;
  y: number;
  text: string;
}

/**
 * Everything one draw call puts on a surface, in drawing order
 */
export interface RenderCommand {
  /** Axes, height scale ticks and the dashed "now" line, drawn under the curve */
  guides: Segment[];
  /** 144 segments joining consecutive samples */
  segments: Segment[];
  /** Position of the offset 0 sample */
  marker: Point;
  /** Height readout, axis labels, offline indicator, scale labels and hour ticks; no two overlap */
  labels: TextLabel[];
}

/**
 * Height-to-row mapping inputs
 */
export interface VerticalLayout {
  topMargin: number;
  bottomMargin: number;
  usableHeight: number;
}

export interface ScaleTick {
  y: number;
  heightFt: number;
}

export interface HeightRange {
  min: number;
  max: number;
  /** max - min, or 1.0 for a flat series */
  range: number;
}

/**
 * Result of one draw call
 */
export type RenderOutcome = Result<RenderCommand, RenderError>;
