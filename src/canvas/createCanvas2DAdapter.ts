/**
 * Canvas2D adapter.
 *
 * Executes step series paths on anything shaped like a `CanvasRenderingContext2D`
 * (browser canvases, OffscreenCanvas, node-canvas). Only the members used here
 * are required, so no DOM typings are needed to compile against it.
 */

import type { ResolvedLineStyleConfig } from '../config/OptionResolver';
import type { DrawCanvas, Path, Rectangle } from './types';

export interface Canvas2DContextLike {
  save(): void;
  restore(): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  closePath(): void;
  fill(): void;
  stroke(): void;
  setLineDash(segments: number[]): void;
  lineDashOffset: number;
  lineWidth: number;
  lineJoin: string;
  lineCap: string;
  globalAlpha: number;
  strokeStyle: unknown;
  fillStyle: unknown;
}

export interface Canvas2DAdapterOptions {
  /**
   * Mirror y within `bounds` so y-up device space lands on a y-down bitmap.
   * Defaults to `true`.
   */
  readonly flipY?: boolean;
}

export function createCanvas2DAdapter(
  ctx: Canvas2DContextLike,
  bounds: Rectangle,
  options?: Canvas2DAdapterOptions
): DrawCanvas {
  const flipY = options?.flipY ?? true;
  const mapY = (y: number): number => (flipY ? bounds.min.y + bounds.max.y - y : y);

  const tracePath = (path: Path): void => {
    ctx.beginPath();
    for (const cmd of path) {
      switch (cmd.type) {
        case 'move':
          ctx.moveTo(cmd.point.x, mapY(cmd.point.y));
          break;
        case 'line':
          ctx.lineTo(cmd.point.x, mapY(cmd.point.y));
          break;
        case 'close':
          ctx.closePath();
          break;
      }
    }
  };

  return {
    bounds,
    fill(path: Path, color: string) {
      if (path.length === 0) return;
      ctx.save();
      ctx.fillStyle = color;
      tracePath(path);
      ctx.fill();
      ctx.restore();
    },
    stroke(path: Path, style: ResolvedLineStyleConfig) {
      if (path.length === 0 || style.width <= 0) return;
      ctx.save();
      ctx.globalAlpha = style.opacity;
      ctx.strokeStyle = style.color;
      ctx.lineWidth = style.width;
      ctx.lineJoin = 'miter';
      ctx.lineCap = 'butt';
      ctx.setLineDash(style.dashes.slice());
      ctx.lineDashOffset = style.dashOffset;
      tracePath(path);
      ctx.stroke();
      ctx.restore();
    },
  };
}
