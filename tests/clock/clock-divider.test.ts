/**
 * @file Tick divider tests
 */

import { describe, it, expect } from 'vitest';
import { effectiveBaud, sampleDivisor, stepDivider } from '../../src/clock/clock-divider';

function strobes(divisor: number, ticks: number): number[] {
  const hits: number[] = [];
  let count = 0;
  for (let tick = 0; tick < ticks; tick += 1) {
    const step = stepDivider(count, divisor);
    count = step.count;
    if (step.strobe) {
      hits.push(tick);
    }
  }
  return hits;
}

describe('stepDivider', () => {
  it('should strobe every tick for divisor 1', () => {
    expect(strobes(1, 4)).toEqual([0, 1, 2, 3]);
  });

  it('should strobe on every divisor-th tick', () => {
    expect(strobes(4, 13)).toEqual([3, 7, 11]);
  });

  it('should return to zero on the strobe', () => {
    expect(stepDivider(2, 3)).toEqual({ count: 0, strobe: true });
    expect(stepDivider(1, 3)).toEqual({ count: 2, strobe: false });
  });
});

describe('sampleDivisor', () => {
  it('should floor the ratio of tick rate to sample rate', () => {
    expect(sampleDivisor(50_000_000, 115_200, 16)).toBe(27);
    expect(sampleDivisor(1_600_000, 100_000, 16)).toBe(1);
  });

  it('should return 0 when the tick rate is too low', () => {
    expect(sampleDivisor(1_000, 115_200, 16)).toBe(0);
    expect(sampleDivisor(0, 9600, 16)).toBe(0);
    expect(sampleDivisor(1_000_000, 0, 16)).toBe(0);
  });
});

describe('effectiveBaud', () => {
  it('should compute the produced rate', () => {
    expect(effectiveBaud(1_600_000, 1, 16)).toBe(100_000);
    expect(effectiveBaud(1_600_000, 0, 16)).toBe(0);
  });
});
