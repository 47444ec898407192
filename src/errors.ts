export type StepPlotErrorCode = 'INVALID_INPUT';

/**
 * Raised when series data cannot be turned into a point sequence.
 *
 * Only thrown at construction time; drawing a constructed series never throws.
 */
export class InvalidInputError extends Error {
  readonly code: StepPlotErrorCode = 'INVALID_INPUT';

  constructor(
    message: string,
    /** Index of the offending point in the source data. */
    readonly index: number
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}
