import { describe, it, expect } from 'vitest';
import { createLinearScale } from '../scales';

describe('createLinearScale', () => {
  it('maps the domain onto the range', () => {
    const scale = createLinearScale().domain(0, 10).range(0, 100);
    expect(scale.scale(0)).toBe(0);
    expect(scale.scale(5)).toBe(50);
    expect(scale.scale(10)).toBe(100);
  });

  it('extrapolates outside the domain', () => {
    const scale = createLinearScale().domain(0, 10).range(0, 100);
    expect(scale.scale(-5)).toBe(-50);
  });

  it('supports inverted ranges', () => {
    const scale = createLinearScale().domain(0, 10).range(100, 0);
    expect(scale.scale(0)).toBe(100);
    expect(scale.scale(10)).toBe(0);
  });

  it('inverts device values back into the domain', () => {
    const scale = createLinearScale().domain(0, 10).range(0, 100);
    expect(scale.invert(25)).toBe(2.5);
  });

  it('maps a zero-span domain to the range midpoint', () => {
    const scale = createLinearScale().domain(3, 3).range(0, 100);
    expect(scale.scale(3)).toBe(50);
    expect(scale.scale(42)).toBe(50);
  });
});
