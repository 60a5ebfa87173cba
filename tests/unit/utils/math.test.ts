/**
 * Math utilities tests
 */

import { describe, it, expect } from 'vitest';
import {
  clamp,
  cumulativeSum,
  hanning,
  linearRegressionSlope,
  linspace,
  maxAbs,
  mean,
  nextPowerOfTwo,
  resampleLinear,
  standardDeviation,
} from '../../../src/utils/math';

describe('clamp', () => {
  it('should return value if within range', () => {
    expect(clamp(5, 0, 10)).toBe(5);
  });

  it('should return the nearest bound outside the range', () => {
    expect(clamp(-5, 0, 10)).toBe(0);
    expect(clamp(15, 0, 10)).toBe(10);
  });
});

describe('linspace', () => {
  it('should include both ends', () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it('should handle degenerate counts', () => {
    expect(linspace(2, 4, 1)).toEqual([2]);
    expect(linspace(2, 4, 0)).toEqual([]);
  });
});

describe('cumulativeSum', () => {
  it('should return running totals', () => {
    expect(cumulativeSum([1, 2, 3])).toEqual([1, 3, 6]);
  });

  it('should return an empty array for empty input', () => {
    expect(cumulativeSum([])).toEqual([]);
  });
});

describe('mean and standardDeviation', () => {
  it('should calculate mean', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(mean([])).toBe(0);
  });

  it('should calculate population standard deviation', () => {
    expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('should return 0 for fewer than two values', () => {
    expect(standardDeviation([3])).toBe(0);
  });
});

describe('maxAbs', () => {
  it('should return the largest magnitude', () => {
    expect(maxAbs([1, -3, 2])).toBe(3);
  });

  it('should return 0 for an empty array', () => {
    expect(maxAbs([])).toBe(0);
  });
});

describe('hanning', () => {
  it('should be zero at both ends and one in the middle', () => {
    const window = hanning(5);
    expect(window).toHaveLength(5);
    expect(window[0]).toBe(0);
    expect(window[1]).toBeCloseTo(0.5, 12);
    expect(window[2]).toBe(1);
    expect(window[4]).toBeCloseTo(0, 12);
  });

  it('should handle tiny windows', () => {
    expect(hanning(1)).toEqual([1]);
    expect(hanning(0)).toEqual([]);
  });
});

describe('resampleLinear', () => {
  it('should interpolate between points', () => {
    expect(resampleLinear([0, 10], 5)).toEqual([0, 2.5, 5, 7.5, 10]);
  });

  it('should keep the input points when the count matches', () => {
    expect(resampleLinear([1, 3, 2], 3)).toEqual([1, 3, 2]);
  });

  it('should repeat a single value and zero-fill empty input', () => {
    expect(resampleLinear([5], 3)).toEqual([5, 5, 5]);
    expect(resampleLinear([], 2)).toEqual([0, 0]);
  });
});

describe('nextPowerOfTwo', () => {
  it('should round up to a power of two of at least 2', () => {
    expect(nextPowerOfTwo(1)).toBe(2);
    expect(nextPowerOfTwo(5)).toBe(8);
    expect(nextPowerOfTwo(8)).toBe(8);
    expect(nextPowerOfTwo(4097)).toBe(8192);
  });
});

describe('linearRegressionSlope', () => {
  it('should fit an exact line', () => {
    expect(linearRegressionSlope([0, 1, 2, 3], [1, 3, 5, 7])).toBe(2);
  });

  it('should return 0 when x does not vary', () => {
    expect(linearRegressionSlope([1, 1, 1], [1, 2, 3])).toBe(0);
  });

  it('should reject mismatched lengths', () => {
    expect(() => linearRegressionSlope([1, 2], [1])).toThrow('same length');
  });
});
