/**
 * Tests for step path construction.
 * Covers the fill polygon, clipped stroke segments and the per-kind step vertices.
 */

import { describe, it, expect } from 'vitest';
import { buildFillPolygon, buildStrokeSegments, stepVertices } from '../stepPath';
import { pathVertices } from '../../canvas/createPathBuilder';
import type { PathCommand, Point, Rectangle } from '../../canvas/types';
import type { StepKind } from '../../config/types';

const move = (x: number, y: number): PathCommand => ({ type: 'move', point: { x, y } });
const line = (x: number, y: number): PathCommand => ({ type: 'line', point: { x, y } });
const close: PathCommand = { type: 'close' };

const pts = (...xy: Array<[number, number]>): Point[] => xy.map(([x, y]) => ({ x, y }));

const everything: Rectangle = { min: { x: -1e9, y: -1e9 }, max: { x: 1e9, y: 1e9 } };
const allKinds: StepKind[] = ['pre', 'mid', 'post'];

describe('stepVertices', () => {
  it('inserts a corner at (prev.x, pt.y) for pre steps', () => {
    expect(stepVertices(pts([0, 1], [1, 3], [2, 2]), 'pre')).toEqual(pts([0, 1], [0, 3], [1, 3], [1, 2], [2, 2]));
  });

  it('inserts two corners at the x-midpoint for mid steps', () => {
    expect(stepVertices(pts([0, 1], [2, 3]), 'mid')).toEqual(pts([0, 1], [1, 1], [1, 3], [2, 3]));
  });

  it('inserts a corner at (pt.x, prev.y) for post steps', () => {
    expect(stepVertices(pts([0, 1], [1, 3], [2, 2]), 'post')).toEqual(
      pts([0, 1], [1, 1], [1, 3], [2, 3], [2, 2])
    );
  });

  it('returns an empty list for no points', () => {
    expect(stepVertices([], 'mid')).toEqual([]);
  });
});

describe('buildFillPolygon', () => {
  const points = pts([0, 1], [1, 3], [2, 2]);

  it('omits the initial riser for pre steps', () => {
    // Same outline as (0,0)→(0,1)→(0,3)…; the (0,1) vertex would be collinear.
    expect(buildFillPolygon(points, 'pre', 0)).toEqual([
      move(0, 0),
      line(0, 3),
      line(1, 3),
      line(1, 2),
      line(2, 2),
      line(2, 0),
      close,
    ]);
  });

  it('draws the initial riser and midpoint steps for mid steps', () => {
    expect(buildFillPolygon(pts([0, 1], [2, 3]), 'mid', 0)).toEqual([
      move(0, 0),
      line(0, 1),
      line(1, 1),
      line(1, 3),
      line(2, 3),
      line(2, 0),
      close,
    ]);
  });

  it('omits the final riser for post steps', () => {
    expect(buildFillPolygon(points, 'post', 0)).toEqual([
      move(0, 0),
      line(0, 1),
      line(1, 1),
      line(1, 3),
      line(2, 3),
      line(2, 0),
      close,
    ]);
  });

  it('starts and ends on the baseline and closes for every step kind', () => {
    const data = pts([3, 7], [5, -2], [6, 4], [9, 1]);
    for (const kind of allKinds) {
      const path = buildFillPolygon(data, kind, -10);
      const vertices = pathVertices(path);
      expect(vertices[0]).toEqual({ x: 3, y: -10 });
      expect(vertices[vertices.length - 1]).toEqual({ x: 9, y: -10 });
      expect(path[path.length - 1]).toEqual(close);
    }
  });

  it('degenerates to a zero-width shape for a single point', () => {
    expect(buildFillPolygon(pts([5, 5]), 'post', 0)).toEqual([move(5, 0), line(5, 5), line(5, 0), close]);
    expect(buildFillPolygon(pts([5, 5]), 'pre', 0)).toEqual([move(5, 0), line(5, 0), close]);
  });

  it('returns an empty path for no points', () => {
    expect(buildFillPolygon([], 'pre', 0)).toEqual([]);
  });

  it('is idempotent and leaves the input untouched', () => {
    const data = pts([0, 1], [1, 3], [2, 2]);
    const snapshot = data.map((p) => ({ ...p }));
    expect(buildFillPolygon(data, 'mid', 0)).toEqual(buildFillPolygon(data, 'mid', 0));
    expect(data).toEqual(snapshot);
  });
});

describe('buildStrokeSegments', () => {
  it('builds the post step polyline', () => {
    const paths = buildStrokeSegments(pts([0, 1], [1, 3], [2, 2]), 'post', everything);
    expect(paths).toHaveLength(1);
    expect(paths[0]).toEqual([move(0, 1), line(1, 1), line(1, 3), line(2, 3), line(2, 2)]);
  });

  it('produces one path holding every input point in order when nothing is clipped', () => {
    const data = pts([0, 4], [1, -1], [3, 2], [4, 8], [7, 0]);
    for (const kind of allKinds) {
      const paths = buildStrokeSegments(data, kind, everything);
      expect(paths).toHaveLength(1);
      expect(pathVertices(paths[0])).toEqual(stepVertices(data, kind));

      const vertices = pathVertices(paths[0]);
      let cursor = 0;
      for (const p of data) {
        const found = vertices.findIndex((v, i) => i >= cursor && v.x === p.x && v.y === p.y);
        expect(found).toBeGreaterThanOrEqual(cursor);
        cursor = found + 1;
      }
    }
  });

  it('places mid step corners at the mean of the bracketing x values', () => {
    const data = pts([0, 4], [3, -1], [4, 2], [10, 8]);
    const vertices = pathVertices(buildStrokeSegments(data, 'mid', everything)[0]);
    // Layout: p0, c, c, p1, c, c, p2, ...
    for (let i = 1; i < data.length; i++) {
      const mean = (data[i - 1].x + data[i].x) / 2;
      expect(vertices[3 * i - 2].x).toBe(mean);
      expect(vertices[3 * i - 1].x).toBe(mean);
    }
  });

  it('splits the line where it leaves and re-enters the clip rectangle', () => {
    const clip: Rectangle = { min: { x: 0, y: 0 }, max: { x: 20, y: 10 } };
    const paths = buildStrokeSegments(pts([0, 0], [10, 20], [20, 0]), 'post', clip);
    expect(paths).toEqual([
      [move(0, 0), line(5, 0), line(5, 10)],
      [move(15, 10), line(20, 10), line(20, 0)],
    ]);
  });

  it('draws nothing for a single point', () => {
    expect(buildStrokeSegments(pts([5, 5]), 'pre', everything)).toEqual([]);
  });

  it('draws nothing when the whole line is outside the clip rectangle', () => {
    const clip: Rectangle = { min: { x: 0, y: 0 }, max: { x: 10, y: 10 } };
    expect(buildStrokeSegments(pts([20, 20], [30, 25]), 'mid', clip)).toEqual([]);
  });

  it('is idempotent', () => {
    const data = pts([0, 1], [1, 3], [2, 2]);
    expect(buildStrokeSegments(data, 'pre', everything)).toEqual(buildStrokeSegments(data, 'pre', everything));
  });
});
