/**
 * Exhaustiveness guard for `switch` statements over closed unions.
 *
 * Only reachable at runtime when an untyped caller passes a value outside the union.
 */
export const assertUnreachable = (value: never): never => {
  throw new Error(`Unhandled value: ${String(value)}`);
};
