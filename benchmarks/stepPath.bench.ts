/**
 * Step path benchmark.
 *
 * Measures fill polygon and clipped stroke construction for each step kind at
 * several data scales. Run with `npm run bench`.
 */

import { bench, describe } from 'vitest';
import { buildFillPolygon, buildStrokeSegments } from '../src/core/stepPath';
import type { Point, Rectangle } from '../src/canvas/types';
import { stepKinds } from '../src/config/defaults';

/**
 * Generate test data: deterministic sine wave spread across a 1000x500 device area.
 */
function generateDevicePoints(count: number): ReadonlyArray<Point> {
  const out: Point[] = new Array(count);
  for (let i = 0; i < count; i++) {
    const t = i / count;
    const y = Math.sin(t * 40) * 0.8 + Math.sin(t * 93) * 0.2;
    out[i] = { x: t * 1000, y: 250 + y * 300 };
  }
  return out;
}

// Sine peaks overshoot the top and bottom edges, so strokes split into many fragments.
const clip: Rectangle = { min: { x: 0, y: 0 }, max: { x: 1000, y: 500 } };

const scales = [
  { name: '10K', count: 10_000 },
  { name: '100K', count: 100_000 },
];

for (const scale of scales) {
  const points = generateDevicePoints(scale.count);

  describe(`${scale.name} points`, () => {
    for (const kind of stepKinds) {
      bench(`buildFillPolygon (${kind})`, () => {
        buildFillPolygon(points, kind, 0);
      });
      bench(`buildStrokeSegments (${kind})`, () => {
        buildStrokeSegments(points, kind, clip);
      });
    }
  });
}
