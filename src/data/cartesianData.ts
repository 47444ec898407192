/**
 * Cartesian data access for CartesianSeriesData.
 *
 * Supports all three cartesian formats:
 * - ReadonlyArray<DataPoint> (tuple or object)
 * - XYArraysData (separate x/y arrays)
 * - InterleavedXYData (typed array with [x0,y0,x1,y1,...] layout)
 *
 * @module cartesianData
 */

import type { CartesianSeriesData, DataPoint, InterleavedXYData, XYArraysData } from '../config/types';
import type { Point } from '../canvas/types';
import { InvalidInputError } from '../errors';

/**
 * Type guard for InterleavedXYData format (typed array view).
 */
function isInterleavedXYData(data: CartesianSeriesData): data is InterleavedXYData {
  return ArrayBuffer.isView(data);
}

/**
 * Type guard for XYArraysData format.
 */
function isXYArraysData(data: CartesianSeriesData): data is XYArraysData {
  return !Array.isArray(data) && !ArrayBuffer.isView(data) && 'x' in data && 'y' in data;
}

/**
 * Type guard for tuple DataPoint format.
 */
function isTupleDataPoint(p: DataPoint): p is readonly [number, number] {
  return Array.isArray(p);
}

const readDataPoint = (data: ReadonlyArray<DataPoint>, i: number): DataPoint | undefined => {
  const p: unknown = data[i];
  // Guard against holes and null entries coming from untyped callers.
  if (p === undefined || p === null || typeof p !== 'object') return undefined;
  return data[i];
};

/**
 * Returns the number of points in the CartesianSeriesData.
 */
export function getPointCount(data: CartesianSeriesData): number {
  if (isInterleavedXYData(data)) {
    // Tolerant of odd length: the trailing value is ignored.
    return Math.floor(data.length / 2);
  }

  if (isXYArraysData(data)) {
    return Math.min(data.x.length, data.y.length);
  }

  return data.length;
}

/**
 * Returns the x-coordinate of the point at index i.
 * Returns NaN for missing entries so callers using `Number.isFinite()` can detect them.
 */
export function getX(data: CartesianSeriesData, i: number): number {
  if (isInterleavedXYData(data)) return data[i * 2];
  if (isXYArraysData(data)) return data.x[i];

  const p = readDataPoint(data, i);
  if (p === undefined) return NaN;
  return isTupleDataPoint(p) ? p[0] : p.x;
}

/**
 * Returns the y-coordinate of the point at index i.
 * Returns NaN for missing entries so callers using `Number.isFinite()` can detect them.
 */
export function getY(data: CartesianSeriesData, i: number): number {
  if (isInterleavedXYData(data)) return data[i * 2 + 1];
  if (isXYArraysData(data)) return data.y[i];

  const p = readDataPoint(data, i);
  if (p === undefined) return NaN;
  return isTupleDataPoint(p) ? p[1] : p.y;
}

/**
 * Copies CartesianSeriesData into a frozen point sequence.
 *
 * @throws {InvalidInputError} if any point is missing or has a non-finite coordinate.
 */
export function copyPoints(data: CartesianSeriesData): ReadonlyArray<Point> {
  const count = getPointCount(data);
  const out: Point[] = new Array(count);

  for (let i = 0; i < count; i++) {
    const x = getX(data, i);
    const y = getY(data, i);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new InvalidInputError(
        `copyPoints(data): point ${i} is not a finite (x, y) pair. Received: (${String(x)}, ${String(y)})`,
        i
      );
    }
    out[i] = Object.freeze({ x, y });
  }

  return Object.freeze(out);
}
