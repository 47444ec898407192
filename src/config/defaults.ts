import type { LineStyleConfig, StepKind } from './types';

export const defaultStepKind: StepKind = 'pre';

export const defaultLineStyle = {
  width: 1,
  color: '#000000',
  opacity: 1,
  dashes: [],
  dashOffset: 0,
} as const satisfies Required<LineStyleConfig>;

export const stepKinds = ['pre', 'mid', 'post'] as const satisfies ReadonlyArray<StepKind>;
