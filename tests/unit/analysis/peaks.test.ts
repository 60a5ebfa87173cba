/**
 * R-peak detection tests
 */

import { describe, it, expect } from 'vitest';
import { beatIntervals, detectRPeaks, heartRateFromPeaks, type RPeak } from '../../../src/signal/analysis';
import { InvalidParameterError } from '../../../src/utils/validation';

describe('detectRPeaks', () => {
  it('should keep only maxima above the threshold', () => {
    const signal = [0, 1, 0, 0, 0, 2, 0];
    expect(detectRPeaks(signal, 10, { refractory: 0.1 })).toEqual([{ index: 5, amplitude: 2 }]);
    expect(detectRPeaks(signal, 10, { refractory: 0.1, threshold: 0.4 })).toEqual([
      { index: 1, amplitude: 1 },
      { index: 5, amplitude: 2 },
    ]);
  });

  it('should keep the taller peak inside the refractory period', () => {
    const signal = [0, 1, 0, 1.5, 0, 0];
    expect(detectRPeaks(signal, 10, { refractory: 0.5 })).toEqual([{ index: 3, amplitude: 1.5 }]);
  });

  it('should report a flat top once, at its first sample', () => {
    expect(detectRPeaks([0, 1, 1, 0], 10, { refractory: 0.1 })).toEqual([{ index: 1, amplitude: 1 }]);
  });

  it('should find nothing in a flat signal', () => {
    expect(detectRPeaks([0, 0, 0, 0], 10)).toEqual([]);
  });

  it('should reject a threshold above 1', () => {
    expect(() => detectRPeaks([0, 1, 0], 10, { threshold: 2 })).toThrow(InvalidParameterError);
  });
});

describe('beat intervals and rate', () => {
  const peaks: RPeak[] = [
    { index: 0, amplitude: 1 },
    { index: 250, amplitude: 1 },
    { index: 500, amplitude: 1 },
    { index: 1000, amplitude: 1 },
  ];

  it('should convert index gaps to seconds', () => {
    expect(beatIntervals(peaks, 250)).toEqual([1, 1, 2]);
  });

  it('should use the median interval', () => {
    expect(heartRateFromPeaks(peaks, 250)).toBe(60);
    expect(heartRateFromPeaks(peaks.slice(1), 250)).toBe(30);
  });

  it('should return 0 with fewer than two peaks', () => {
    expect(heartRateFromPeaks(peaks.slice(0, 1), 250)).toBe(0);
  });
});
