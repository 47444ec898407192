import type { Rectangle } from '../canvas/types';
import { createLinearScale } from '../utils/scales';

export interface AxisDomain {
  readonly min: number;
  readonly max: number;
}

/**
 * Per-draw context supplied by the surrounding plot: the data→device
 * transforms for both axes and the axis domains they were built from.
 */
export interface PlotContext {
  readonly transformX: (x: number) => number;
  readonly transformY: (y: number) => number;
  readonly xAxis: AxisDomain;
  readonly yAxis: AxisDomain;
}

export interface PlotContextConfig {
  /** Device-space rectangle the domains are mapped onto (y-up). */
  readonly bounds: Rectangle;
  readonly xDomain: AxisDomain;
  readonly yDomain: AxisDomain;
}

export function createPlotContext(config: PlotContextConfig): PlotContext {
  const { bounds, xDomain, yDomain } = config;
  const xScale = createLinearScale().domain(xDomain.min, xDomain.max).range(bounds.min.x, bounds.max.x);
  const yScale = createLinearScale().domain(yDomain.min, yDomain.max).range(bounds.min.y, bounds.max.y);

  return {
    transformX: (x) => xScale.scale(x),
    transformY: (y) => yScale.scale(y),
    xAxis: { min: xDomain.min, max: xDomain.max },
    yAxis: { min: yDomain.min, max: yDomain.max },
  };
}
