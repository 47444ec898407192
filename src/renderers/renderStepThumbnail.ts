import type { ResolvedLineStyleConfig } from '../config/OptionResolver';
import { clipPolygonXY } from '../canvas/clip';
import { createPathBuilder } from '../canvas/createPathBuilder';
import { rectangleCenter } from '../canvas/types';
import type { DrawCanvas, Path, Point } from '../canvas/types';

export interface StepThumbnailStyle {
  readonly fillColor: string | null;
  readonly lineStyle: ResolvedLineStyleConfig | null;
}

const polygonPath = (polygon: ReadonlyArray<Point>): Path => {
  if (polygon.length === 0) return [];
  const [first, ...rest] = polygon;
  const path = createPathBuilder().moveTo(first);
  for (const p of rest) path.lineTo(p);
  return path.close().build();
};

/**
 * Draws the legend icon of a step series into `canvas.bounds`.
 *
 * The fill box reaches the top edge when there is no line, and stops at the
 * vertical center when a line is drawn through it. Independent of any data.
 */
export function renderStepThumbnail(canvas: DrawCanvas, style: StepThumbnailStyle): void {
  const box = canvas.bounds;
  const center = rectangleCenter(box);

  if (style.fillColor !== null) {
    const top = style.lineStyle !== null ? center.y : box.max.y;
    const rect: Point[] = [
      { x: box.min.x, y: box.min.y },
      { x: box.min.x, y: top },
      { x: box.max.x, y: top },
      { x: box.max.x, y: box.min.y },
    ];
    const path = polygonPath(clipPolygonXY(rect, box));
    if (path.length > 0) canvas.fill(path, style.fillColor);
  }

  if (style.lineStyle !== null) {
    const line = createPathBuilder()
      .moveTo({ x: box.min.x, y: center.y })
      .lineTo({ x: box.max.x, y: center.y })
      .build();
    canvas.stroke(line, style.lineStyle);
  }
}
