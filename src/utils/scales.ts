/**
 * Linear scale mapping a data domain onto a device range.
 *
 * Setters are chainable. A zero-span domain maps every value to the range midpoint.
 */
export interface LinearScale {
  domain(min: number, max: number): LinearScale;
  range(min: number, max: number): LinearScale;
  scale(value: number): number;
  invert(pixel: number): number;
}

export function createLinearScale(): LinearScale {
  let domainMin = 0;
  let domainMax = 1;
  let rangeMin = 0;
  let rangeMax = 1;

  const self: LinearScale = {
    domain(min, max) {
      domainMin = min;
      domainMax = max;
      return self;
    },
    range(min, max) {
      rangeMin = min;
      rangeMax = max;
      return self;
    },
    scale(value) {
      const span = domainMax - domainMin;
      if (span === 0) return (rangeMin + rangeMax) / 2;
      const t = (value - domainMin) / span;
      return rangeMin + t * (rangeMax - rangeMin);
    },
    invert(pixel) {
      const span = rangeMax - rangeMin;
      if (span === 0) return (domainMin + domainMax) / 2;
      const t = (pixel - rangeMin) / span;
      return domainMin + t * (domainMax - domainMin);
    },
  };

  return self;
}
