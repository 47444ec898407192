import type { LineStyleConfig, StepKind, StepSeriesOptions } from './types';
import { defaultLineStyle, defaultStepKind, stepKinds } from './defaults';

export type ResolvedLineStyleConfig = Readonly<Required<LineStyleConfig>>;

/**
 * Step series options with every default applied.
 *
 * `lineStyle` and `fillColor` stay nullable: `null` is the "not drawn" state,
 * and the two are independent of each other.
 */
export interface ResolvedStepSeriesOptions {
  readonly name: string;
  readonly step: StepKind;
  readonly lineStyle: ResolvedLineStyleConfig | null;
  readonly fillColor: string | null;
  readonly baseline: number | null;
}

const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));

const normalizeOptionalColor = (color: unknown): string | undefined => {
  if (typeof color !== 'string') return undefined;
  const trimmed = color.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const isStepKind = (value: unknown): value is StepKind =>
  typeof value === 'string' && stepKinds.some((kind) => kind === value);

const resolveStepKind = (value: unknown): StepKind => {
  if (value === undefined) return defaultStepKind;
  if (isStepKind(value)) return value;
  // Only reachable from untyped callers.
  console.warn(`resolveStepSeriesOptions: unknown step kind ${JSON.stringify(value)}, falling back to '${defaultStepKind}'.`);
  return defaultStepKind;
};

const sanitizeDashes = (dashes: unknown): number[] => {
  if (!Array.isArray(dashes)) return [];
  return dashes.filter((d): d is number => typeof d === 'number' && Number.isFinite(d) && d >= 0);
};

export const resolveLineStyle = (lineStyle: LineStyleConfig | null | undefined): ResolvedLineStyleConfig | null => {
  if (lineStyle === null) return null;
  if (lineStyle === undefined) return { ...defaultLineStyle, dashes: [] };

  const width =
    typeof lineStyle.width === 'number' && Number.isFinite(lineStyle.width) && lineStyle.width >= 0
      ? lineStyle.width
      : defaultLineStyle.width;
  const opacity =
    typeof lineStyle.opacity === 'number' && Number.isFinite(lineStyle.opacity)
      ? clamp01(lineStyle.opacity)
      : defaultLineStyle.opacity;
  const dashOffset =
    typeof lineStyle.dashOffset === 'number' && Number.isFinite(lineStyle.dashOffset)
      ? lineStyle.dashOffset
      : defaultLineStyle.dashOffset;

  return {
    width,
    color: normalizeOptionalColor(lineStyle.color) ?? defaultLineStyle.color,
    opacity,
    dashes: sanitizeDashes(lineStyle.dashes),
    dashOffset,
  };
};

export function resolveStepSeriesOptions(options: StepSeriesOptions = {}): ResolvedStepSeriesOptions {
  const baseline =
    typeof options.baseline === 'number' && Number.isFinite(options.baseline) ? options.baseline : null;

  return {
    name: typeof options.name === 'string' ? options.name : '',
    step: resolveStepKind(options.step),
    lineStyle: resolveLineStyle(options.lineStyle),
    fillColor: normalizeOptionalColor(options.fillColor) ?? null,
    baseline,
  };
}
