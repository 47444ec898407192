/**
 * Line and polygon clipping against an axis-aligned rectangle.
 *
 * Points lying less than `CLIP_SLOP` outside an edge count as inside.
 *
 * @module clip
 */

import type { Point, Rectangle } from './types';

export const CLIP_SLOP = 0.01;

interface ClipEdge {
  isOutside(p: Point): boolean;
  /** Crossing of segment a→b with the edge. Only called when exactly one end is outside. */
  intersect(a: Point, b: Point): Point;
}

const intersectVertical = (a: Point, b: Point, x: number): Point => {
  const t = (x - a.x) / (b.x - a.x);
  return { x, y: a.y + (b.y - a.y) * t };
};

const intersectHorizontal = (a: Point, b: Point, y: number): Point => {
  const t = (y - a.y) / (b.y - a.y);
  return { x: a.x + (b.x - a.x) * t, y };
};

const leftEdge = (rect: Rectangle): ClipEdge => ({
  isOutside: (p) => p.x < rect.min.x - CLIP_SLOP,
  intersect: (a, b) => intersectVertical(a, b, rect.min.x),
});

const rightEdge = (rect: Rectangle): ClipEdge => ({
  isOutside: (p) => p.x > rect.max.x + CLIP_SLOP,
  intersect: (a, b) => intersectVertical(a, b, rect.max.x),
});

const bottomEdge = (rect: Rectangle): ClipEdge => ({
  isOutside: (p) => p.y < rect.min.y - CLIP_SLOP,
  intersect: (a, b) => intersectHorizontal(a, b, rect.min.y),
});

const topEdge = (rect: Rectangle): ClipEdge => ({
  isOutside: (p) => p.y > rect.max.y + CLIP_SLOP,
  intersect: (a, b) => intersectHorizontal(a, b, rect.max.y),
});

/**
 * Clips one polyline against a single edge. Each exit from the inside
 * half-plane ends the current fragment; each re-entry starts a new one.
 */
const clipPolylineAgainst = (edge: ClipEdge, line: ReadonlyArray<Point>): Point[][] => {
  if (line.length === 0) return [];

  const fragments: Point[][] = [];
  let current: Point[] = [];

  for (let i = 1; i < line.length; i++) {
    const cur = line[i - 1];
    const next = line[i];
    const curOut = edge.isOutside(cur);
    const nextOut = edge.isOutside(next);

    if (curOut && nextOut) continue;

    current.push(curOut ? edge.intersect(cur, next) : cur);
    if (nextOut) {
      current.push(edge.intersect(cur, next));
      fragments.push(current);
      current = [];
    }
  }

  const last = line[line.length - 1];
  if (edge.isOutside(last)) return fragments;

  current.push(last);
  fragments.push(current);
  return fragments;
};

const clipPolylinesAgainst = (
  edges: ReadonlyArray<ClipEdge>,
  lines: ReadonlyArray<ReadonlyArray<Point>>
): Point[][] => {
  let result: ReadonlyArray<ReadonlyArray<Point>> = lines;
  for (const edge of edges) {
    const next: Point[][] = [];
    for (const line of result) {
      for (const fragment of clipPolylineAgainst(edge, line)) next.push(fragment);
    }
    result = next;
  }
  return result.map((line) => line.slice());
};

/**
 * Clips polylines against the left and right edges of `rect`.
 */
export function clipLinesX(lines: ReadonlyArray<ReadonlyArray<Point>>, rect: Rectangle): Point[][] {
  return clipPolylinesAgainst([leftEdge(rect), rightEdge(rect)], lines);
}

/**
 * Clips polylines against the bottom and top edges of `rect`.
 */
export function clipLinesY(lines: ReadonlyArray<ReadonlyArray<Point>>, rect: Rectangle): Point[][] {
  return clipPolylinesAgainst([bottomEdge(rect), topEdge(rect)], lines);
}

/**
 * Clips polylines against all four edges of `rect`, returning the visible
 * fragments in traversal order. A fragment may consist of a single point.
 */
export function clipLinesXY(lines: ReadonlyArray<ReadonlyArray<Point>>, rect: Rectangle): Point[][] {
  return clipPolylinesAgainst([leftEdge(rect), rightEdge(rect), bottomEdge(rect), topEdge(rect)], lines);
}

// Sutherland–Hodgman, one edge at a time.
const clipPolygonAgainst = (edge: ClipEdge, polygon: ReadonlyArray<Point>): Point[] => {
  const out: Point[] = [];
  const n = polygon.length;
  for (let i = 0; i < n; i++) {
    const prev = polygon[(i + n - 1) % n];
    const cur = polygon[i];
    const prevIn = !edge.isOutside(prev);
    const curIn = !edge.isOutside(cur);

    if (curIn) {
      if (!prevIn) out.push(edge.intersect(prev, cur));
      out.push(cur);
    } else if (prevIn) {
      out.push(edge.intersect(prev, cur));
    }
  }
  return out;
};

const clipPolygonAgainstAll = (edges: ReadonlyArray<ClipEdge>, polygon: ReadonlyArray<Point>): Point[] => {
  let result: Point[] = polygon.slice();
  for (const edge of edges) {
    if (result.length === 0) break;
    result = clipPolygonAgainst(edge, result);
  }
  return result;
};

export function clipPolygonX(polygon: ReadonlyArray<Point>, rect: Rectangle): Point[] {
  return clipPolygonAgainstAll([leftEdge(rect), rightEdge(rect)], polygon);
}

export function clipPolygonY(polygon: ReadonlyArray<Point>, rect: Rectangle): Point[] {
  return clipPolygonAgainstAll([bottomEdge(rect), topEdge(rect)], polygon);
}

export function clipPolygonXY(polygon: ReadonlyArray<Point>, rect: Rectangle): Point[] {
  return clipPolygonAgainstAll([leftEdge(rect), rightEdge(rect), bottomEdge(rect), topEdge(rect)], polygon);
}
