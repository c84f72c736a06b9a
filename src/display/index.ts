/**
 * Display module barrel export
 *
 * - Renderer (buildRenderCommand, drawSeries)
 * - Bitmap sink with frame drivers
 * - Text grid sink
 */

export { buildRenderCommand, drawSeries, AXIS_LABELS, HOUR_TICK_LABEL, OFFLINE_LABEL } from './renderer';
export {
  axisRow,
  centeredTextX,
  computeLayout,
  computeRange,
  formatHeightLabel,
  formatScaleLabel,
  labelsOverlap,
  rasterizeLine,
  scaleTicks,
  xForIndex,
  yForHeight
} from './helpers';
export { createBitmapSink, createPbmDriver, encodePbm } from './bitmap';
export { createTextSink } from './text';

export type {
  HeightRange,
  PixelSink,
  Point,
  RenderCommand,
  RenderOutcome,
  ScaleTick,
  Segment,
  SurfaceGeometry,
  TextLabel,
  VerticalLayout
} from './types';
export type { BitmapSink, BitmapSinkConfig, Frame, FrameDriver } from './bitmap';
export type { LineWriter, TextSink, TextSinkConfig } from './text';
