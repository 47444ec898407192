/**
 * Step path construction.
 *
 * Turns a device-space point sequence into:
 * - a closed fill polygon bounded below by the baseline, and
 * - one stroke path per visible (clipped) fragment of the line.
 *
 * All functions are pure: inputs are never mutated and every call builds fresh geometry.
 * None of them throw; empty or non-finite input yields empty or degenerate paths.
 *
 * @module stepPath
 */

import type { StepKind } from '../config/types';
import { assertUnreachable } from '../utils/assertUnreachable';
import { clipLinesXY } from '../canvas/clip';
import { createPathBuilder } from '../canvas/createPathBuilder';
import type { Path, Point, Rectangle } from '../canvas/types';

const midX = (a: Point, b: Point): number => (a.x + b.x) / 2;

/**
 * Vertices inserted between `prev` and `pt` on the stroke, excluding both ends.
 */
const strokeRisers = (prev: Point, pt: Point, stepKind: StepKind): Point[] => {
  switch (stepKind) {
    case 'pre':
      return [{ x: prev.x, y: pt.y }];
    case 'mid': {
      const m = midX(prev, pt);
      return [
        { x: m, y: prev.y },
        { x: m, y: pt.y },
      ];
    }
    case 'post':
      return [{ x: pt.x, y: prev.y }];
    default:
      return assertUnreachable(stepKind);
  }
};

/**
 * Returns the vertices of the step polyline through `points`, in order:
 * every input point plus the step corners inserted between neighbours.
 *
 * @example
 * ```ts
 * stepVertices([{ x: 0, y: 1 }, { x: 1, y: 3 }], 'post');
 * // [{ x: 0, y: 1 }, { x: 1, y: 1 }, { x: 1, y: 3 }]
 * ```
 */
export function stepVertices(points: ReadonlyArray<Point>, stepKind: StepKind): Point[] {
  if (points.length === 0) return [];

  const out: Point[] = [{ x: points[0].x, y: points[0].y }];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const pt = points[i];
    out.push(...strokeRisers(prev, pt, stepKind), { x: pt.x, y: pt.y });
  }
  return out;
}

/**
 * Builds the closed polygon between the step line and the horizontal line `y = minY`.
 *
 * The polygon starts at `(points[0].x, minY)` and ends with an edge down to
 * `(points[n - 1].x, minY)` before closing. Two edges are deliberately left out:
 * - `'pre'` skips the initial riser to `points[0]`; the first pre-step draws it.
 * - `'post'` skips the final riser to the last point; the closing edge covers it.
 *
 * Returns an empty path for an empty sequence.
 */
export function buildFillPolygon(points: ReadonlyArray<Point>, stepKind: StepKind, minY: number): Path {
  const n = points.length;
  if (n === 0) return [];

  const path = createPathBuilder();
  let prev = points[0];
  path.moveTo({ x: prev.x, y: minY });
  if (stepKind !== 'pre') {
    path.lineTo(prev);
  }

  for (let i = 1; i < n; i++) {
    const pt = points[i];
    switch (stepKind) {
      case 'pre':
        path.lineTo({ x: prev.x, y: pt.y });
        path.lineTo(pt);
        break;
      case 'mid': {
        const m = midX(prev, pt);
        path.lineTo({ x: m, y: prev.y });
        path.lineTo({ x: m, y: pt.y });
        path.lineTo(pt);
        break;
      }
      case 'post':
        path.lineTo({ x: pt.x, y: prev.y });
        if (i !== n - 1) {
          path.lineTo(pt);
        }
        break;
      default:
        assertUnreachable(stepKind);
    }
    prev = pt;
  }

  path.lineTo({ x: points[n - 1].x, y: minY });
  path.close();
  return path.build();
}

/**
 * Clips `points` to `clip` and builds one open step path per visible fragment.
 *
 * Clipping is applied to the data points before the step corners are inserted,
 * so a fragment begins and ends where the straight polyline crosses the border.
 * Fragments with a single point produce no path.
 */
export function buildStrokeSegments(
  points: ReadonlyArray<Point>,
  stepKind: StepKind,
  clip: Rectangle
): Path[] {
  if (points.length === 0) return [];

  const paths: Path[] = [];
  for (const fragment of clipLinesXY([points], clip)) {
    if (fragment.length < 2) continue;

    const [first, ...rest] = stepVertices(fragment, stepKind);
    const path = createPathBuilder().moveTo(first);
    for (const v of rest) path.lineTo(v);
    paths.push(path.build());
  }
  return paths;
}
