import type { Point } from '../canvas/types';

/**
 * Bounds type for min/max x and y values.
 */
export type DataRange = Readonly<{ xMin: number; xMax: number; yMin: number; yMax: number }>;

/**
 * Tight bounding box of `points`.
 *
 * An empty sequence yields the empty range `{ +Inf, -Inf, +Inf, -Inf }`, which
 * absorbs into any later `min`/`max` union.
 */
export function computePointBounds(points: ReadonlyArray<Point>): DataRange {
  let xMin = Number.POSITIVE_INFINITY;
  let xMax = Number.NEGATIVE_INFINITY;
  let yMin = Number.POSITIVE_INFINITY;
  let yMax = Number.NEGATIVE_INFINITY;

  for (const p of points) {
    if (p.x < xMin) xMin = p.x;
    if (p.x > xMax) xMax = p.x;
    if (p.y < yMin) yMin = p.y;
    if (p.y > yMax) yMax = p.y;
  }

  return { xMin, xMax, yMin, yMax };
}

/**
 * Data range of a step series.
 *
 * When the series is filled, the y-range is widened to include 0 (and the
 * explicit fill baseline, if any) so the filled area is never cut off by the
 * plot's own axis limits.
 */
export function computeStepDataRange(
  points: ReadonlyArray<Point>,
  fillEnabled: boolean,
  baseline?: number | null
): DataRange {
  const bounds = computePointBounds(points);
  if (!fillEnabled) return bounds;

  let yMin = Math.min(bounds.yMin, 0);
  let yMax = Math.max(bounds.yMax, 0);
  if (typeof baseline === 'number' && Number.isFinite(baseline)) {
    yMin = Math.min(yMin, baseline);
    yMax = Math.max(yMax, baseline);
  }

  return { xMin: bounds.xMin, xMax: bounds.xMax, yMin, yMax };
}
