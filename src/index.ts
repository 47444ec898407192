/**
 * step-plot - Step line series for 2-D vector charts
 */

export const version = '1.0.0';

// Series element
export { createStepSeries } from './series/createStepSeries';
export type { StepSeries } from './series/createStepSeries';

// Config types
export type {
  CartesianSeriesData,
  DataPoint,
  DataPointTuple,
  InterleavedXYData,
  LineStyleConfig,
  StepKind,
  StepSeriesOptions,
  XYArraysData,
} from './config/types';

// Options defaults + resolution
export { defaultLineStyle, defaultStepKind, stepKinds } from './config/defaults';
export { resolveLineStyle, resolveStepSeriesOptions } from './config/OptionResolver';
export type { ResolvedLineStyleConfig, ResolvedStepSeriesOptions } from './config/OptionResolver';

// Step geometry - Pure utilities
export { buildFillPolygon, buildStrokeSegments, stepVertices } from './core/stepPath';
export { createPlotContext } from './core/plotContext';
export type { AxisDomain, PlotContext, PlotContextConfig } from './core/plotContext';

// Data utilities
export { copyPoints, getPointCount, getX, getY } from './data/cartesianData';
export { computePointBounds, computeStepDataRange } from './data/stepRange';
export type { DataRange } from './data/stepRange';

// Thumbnails
export { renderStepThumbnail } from './renderers/renderStepThumbnail';
export type { StepThumbnailStyle } from './renderers/renderStepThumbnail';

// Canvas
export type { DrawCanvas, Path, PathCommand, Point, Rectangle } from './canvas/types';
export { rectangleCenter } from './canvas/types';
export { createPathBuilder, pathVertices } from './canvas/createPathBuilder';
export type { PathBuilder } from './canvas/createPathBuilder';
export {
  CLIP_SLOP,
  clipLinesX,
  clipLinesY,
  clipLinesXY,
  clipPolygonX,
  clipPolygonY,
  clipPolygonXY,
} from './canvas/clip';
export { createRecordingCanvas } from './canvas/createRecordingCanvas';
export type { CanvasOperation, RecordingCanvas } from './canvas/createRecordingCanvas';
export { createCanvas2DAdapter } from './canvas/createCanvas2DAdapter';
export type { Canvas2DAdapterOptions, Canvas2DContextLike } from './canvas/createCanvas2DAdapter';

// Scales
export { createLinearScale } from './utils/scales';
export type { LinearScale } from './utils/scales';

// Errors
export { InvalidInputError } from './errors';
export type { StepPlotErrorCode } from './errors';
