/**
 * Time base tests
 */

import { describe, it, expect } from 'vitest';
import { makeTimeBase, secondsToSamples, zeros } from '../../../src/signal/time-base';
import { InvalidParameterError } from '../../../src/utils/validation';

describe('makeTimeBase', () => {
  it('should hold round(fs * D) samples', () => {
    const timeBase = makeTimeBase(1000, 2);
    expect(timeBase.nSamples).toBe(2000);
    expect(timeBase.time).toHaveLength(2000);
    expect(timeBase.time[1]).toBe(0.001);
    expect(timeBase.time[1999]).toBe(1.999);
  });

  it('should round fractional sample counts', () => {
    expect(makeTimeBase(250, 0.503).nSamples).toBe(126);
  });

  it('should be frozen', () => {
    const timeBase = makeTimeBase(100, 1);
    expect(Object.isFrozen(timeBase)).toBe(true);
    expect(Object.isFrozen(timeBase.time)).toBe(true);
  });

  it('should reject non-positive rates and durations', () => {
    expect(() => makeTimeBase(0, 1)).toThrow('samplingRate: must be greater than 0');
    expect(() => makeTimeBase(100, -1)).toThrow('duration: must be greater than 0');
  });

  it('should reject a grid with no samples', () => {
    expect(() => makeTimeBase(100, 0.001)).toThrow(InvalidParameterError);
  });
});

describe('secondsToSamples', () => {
  it('should round to the nearest index', () => {
    expect(secondsToSamples(0.25, 500)).toBe(125);
    expect(secondsToSamples(0.0014, 1000)).toBe(1);
  });
});

describe('zeros', () => {
  it('should return a zero-filled buffer', () => {
    expect(zeros(3)).toEqual([0, 0, 0]);
  });
});
