/**
 * Step series configuration types.
 */

/**
 * Where the vertical transition between two consecutive points is placed.
 *
 * - `'pre'`: vertical at the left point, then horizontal (vertical, horizontal).
 * - `'mid'`: horizontal to the x-midpoint, vertical, horizontal (three segments).
 * - `'post'`: horizontal to the right point, then vertical (horizontal, vertical).
 */
export type StepKind = 'pre' | 'mid' | 'post';

/**
 * A single data point for a series.
 */
export type DataPointTuple = readonly [x: number, y: number];

export type DataPoint = DataPointTuple | Readonly<{ x: number; y: number }>;

/**
 * Separate x/y arrays for cartesian series data.
 * Allows providing data as parallel arrays instead of array-of-objects.
 */
export type XYArraysData = Readonly<{
  x: ArrayLike<number>;
  y: ArrayLike<number>;
}>;

/**
 * Pre-interleaved XY cartesian data as a typed array.
 * Data must be laid out as [x0, y0, x1, y1, ...]; an odd trailing value is ignored.
 */
export type InterleavedXYData = Float32Array | Float64Array | Int32Array | Uint32Array | Int16Array | Uint16Array;

/**
 * Union type for cartesian series data formats.
 * Supports three input formats:
 * - Traditional array of DataPoint objects/tuples
 * - Separate x/y arrays (XYArraysData)
 * - Pre-interleaved typed array (InterleavedXYData)
 */
export type CartesianSeriesData = ReadonlyArray<DataPoint> | XYArraysData | InterleavedXYData;

export interface LineStyleConfig {
  /** Stroke width in device units. */
  readonly width?: number;
  readonly color?: string;
  readonly opacity?: number;
  /**
   * Alternating dash/gap lengths in device units. Empty means a solid line.
   */
  readonly dashes?: ReadonlyArray<number>;
  readonly dashOffset?: number;
}

export interface StepSeriesOptions {
  readonly name?: string;
  /** Defaults to `'pre'`. */
  readonly step?: StepKind;
  /**
   * Stroke style of the step line.
   * Omit for the default style; pass `null` to draw no line at all.
   */
  readonly lineStyle?: LineStyleConfig | null;
  /**
   * Color of the area between the step line and the baseline.
   * Omit or pass `null` to leave the area unfilled.
   */
  readonly fillColor?: string | null;
  /**
   * Baseline in data-space used as the filled area floor.
   * If omitted, the y-axis minimum of the plot is used.
   */
  readonly baseline?: number;
}
