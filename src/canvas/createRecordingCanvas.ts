import type { ResolvedLineStyleConfig } from '../config/OptionResolver';
import type { DrawCanvas, Path, Rectangle } from './types';

export type CanvasOperation =
  | Readonly<{ op: 'fill'; path: Path; color: string }>
  | Readonly<{ op: 'stroke'; path: Path; style: ResolvedLineStyleConfig }>;

export interface RecordingCanvas extends DrawCanvas {
  /** Operations in the order they were issued. */
  readonly operations: ReadonlyArray<CanvasOperation>;
  clear(): void;
}

/**
 * A canvas that records drawing operations instead of rasterizing them.
 *
 * Useful for tests and for callers that serialize geometry themselves.
 */
export function createRecordingCanvas(bounds: Rectangle): RecordingCanvas {
  const operations: CanvasOperation[] = [];

  return {
    bounds,
    operations,
    fill(path, color) {
      operations.push({ op: 'fill', path, color });
    },
    stroke(path, style) {
      operations.push({ op: 'stroke', path, style });
    },
    clear() {
      operations.length = 0;
    },
  };
}
