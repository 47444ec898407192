import type { CartesianSeriesData, StepKind, StepSeriesOptions } from '../config/types';
import { resolveStepSeriesOptions } from '../config/OptionResolver';
import type { ResolvedLineStyleConfig } from '../config/OptionResolver';
import type { DrawCanvas, Point } from '../canvas/types';
import { copyPoints } from '../data/cartesianData';
import { computeStepDataRange } from '../data/stepRange';
import type { DataRange } from '../data/stepRange';
import { buildFillPolygon, buildStrokeSegments } from '../core/stepPath';
import type { PlotContext } from '../core/plotContext';
import { renderStepThumbnail } from '../renderers/renderStepThumbnail';

/**
 * A step plot element: draws a stepped line and the optional fill under it.
 *
 * Instances are immutable. `draw` may be called for several canvases at once;
 * nothing is cached between calls.
 */
export interface StepSeries {
  readonly name: string;
  /** Frozen copy of the data-space points. */
  readonly points: ReadonlyArray<Point>;
  readonly step: StepKind;
  readonly lineStyle: ResolvedLineStyleConfig | null;
  readonly fillColor: string | null;
  /** Data-space fill floor, or `null` to use the y-axis minimum. */
  readonly baseline: number | null;
  draw(canvas: DrawCanvas, plot: PlotContext): void;
  dataRange(): DataRange;
  thumbnail(canvas: DrawCanvas): void;
}

/**
 * Creates a step series from cartesian data.
 *
 * @throws {InvalidInputError} if the data holds a missing or non-finite point.
 *
 * @example
 * ```ts
 * const series = createStepSeries([[0, 1], [1, 3], [2, 2]], { step: 'post', fillColor: '#5470C6' });
 * series.draw(canvas, plot);
 * ```
 */
export function createStepSeries(data: CartesianSeriesData, options?: StepSeriesOptions): StepSeries {
  const points = copyPoints(data);
  const resolved = resolveStepSeriesOptions(options);
  const { name, step, lineStyle, fillColor, baseline } = resolved;

  const draw = (canvas: DrawCanvas, plot: PlotContext): void => {
    // Fresh device-space buffer per call; `points` is shared and read-only.
    const devicePoints: Point[] = points.map((p) => ({ x: plot.transformX(p.x), y: plot.transformY(p.y) }));

    if (fillColor !== null && devicePoints.length > 0) {
      const minY = plot.transformY(baseline ?? plot.yAxis.min);
      canvas.fill(buildFillPolygon(devicePoints, step, minY), fillColor);
    }

    if (lineStyle !== null) {
      for (const path of buildStrokeSegments(devicePoints, step, canvas.bounds)) {
        canvas.stroke(path, lineStyle);
      }
    }
  };

  return {
    name,
    points,
    step,
    lineStyle,
    fillColor,
    baseline,
    draw,
    dataRange: () => computeStepDataRange(points, fillColor !== null, baseline),
    thumbnail: (canvas) => renderStepThumbnail(canvas, { fillColor, lineStyle }),
  };
}
