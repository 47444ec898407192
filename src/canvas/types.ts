/**
 * Vector canvas types.
 *
 * Device space is y-up: `Rectangle.max.y` is the top edge.
 */

import type { ResolvedLineStyleConfig } from '../config/OptionResolver';

export type Point = Readonly<{ x: number; y: number }>;

export type Rectangle = Readonly<{ min: Point; max: Point }>;

export type PathCommand =
  | Readonly<{ type: 'move'; point: Point }>
  | Readonly<{ type: 'line'; point: Point }>
  | Readonly<{ type: 'close' }>;

export type Path = ReadonlyArray<PathCommand>;

/**
 * Target of the step series drawing operations.
 */
export interface DrawCanvas {
  /** Visible drawing area in device space. Stroke geometry is clipped to it. */
  readonly bounds: Rectangle;
  fill(path: Path, color: string): void;
  stroke(path: Path, style: ResolvedLineStyleConfig): void;
}

export const rectangleCenter = (rect: Rectangle): Point => ({
  x: (rect.min.x + rect.max.x) / 2,
  y: (rect.min.y + rect.max.y) / 2,
});
