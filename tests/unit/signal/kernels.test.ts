/**
 * Waveform kernel tests
 */

import { describe, it, expect } from 'vitest';
import {
  exponentialDecay,
  gaussianBump,
  hanningWindow,
  linearRamp,
  muap,
  qrsComplex,
  rectangularPulse,
  saccadePosition,
  saccadeVelocity,
} from '../../../src/signal/kernels';
import { hanning } from '../../../src/utils/math';

describe('muap', () => {
  it('should span 4 ms and be antisymmetric', () => {
    const kernel = muap(1000);
    expect(kernel).toHaveLength(4);
    expect(kernel[0]).toBeGreaterThan(0);
    expect(kernel[3]).toBeCloseTo(-kernel[0], 15);
    expect(kernel[1]).toBeCloseTo(-kernel[2], 15);
  });
});

describe('gaussianBump', () => {
  it('should be symmetric around the centre', () => {
    const kernel = gaussianBump(0.3, 0.14, 500);
    expect(kernel).toHaveLength(70);
    expect(kernel[0]).toBeCloseTo(0.3 * Math.exp(-100 * 0.07 * 0.07), 12);
    expect(kernel[69]).toBeCloseTo(kernel[0], 12);
    expect(Math.max(...kernel)).toBeLessThanOrEqual(0.3);
  });

  it('should be empty for a duration under half a sample', () => {
    expect(gaussianBump(1, 0.001, 100)).toEqual([]);
  });
});

describe('qrsComplex', () => {
  it('should peak at the R amplitude minus the Q and S tails', () => {
    const kernel = qrsComplex({ qAmp: -0.5, rAmp: 1, sAmp: -0.2, duration: 0.1 }, 1010);
    expect(kernel).toHaveLength(101);
    const tail = Math.exp(-50 / 16);
    expect(kernel[50]).toBeCloseTo(1 - 0.5 * tail - 0.2 * tail, 10);
  });

  it('should scale its width with the duration', () => {
    const narrow = qrsComplex({ qAmp: 0, rAmp: 1, sAmp: 0, duration: 0.08 }, 1000);
    const wide = qrsComplex({ qAmp: 0, rAmp: 1, sAmp: 0, duration: 0.16 }, 1000);
    expect(narrow).toHaveLength(80);
    expect(wide).toHaveLength(160);
    expect(narrow[0]).toBeCloseTo(wide[0], 10);
  });
});

describe('saccade kernels', () => {
  it('should keep at least one velocity sample', () => {
    expect(saccadeVelocity(0.0001, 300, 100)).toHaveLength(1);
  });

  it('should peak a third of the way through', () => {
    const velocity = saccadeVelocity(0.06, 600, 1000);
    expect(velocity).toHaveLength(60);
    const peak = velocity.indexOf(Math.max(...velocity));
    expect(peak).toBe(20);
  });

  it('should rise monotonically to exactly the amplitude', () => {
    const position = saccadePosition(20, 0.06, 600, 1000);
    expect(position).toHaveLength(60);
    expect(position[59]).toBeCloseTo(20, 12);
    for (let i = 1; i < position.length; i++) {
      expect(position[i]).toBeGreaterThanOrEqual(position[i - 1]);
    }
  });

  it('should move the other way for negative amplitudes', () => {
    const position = saccadePosition(-5, 0.03, 300, 1000);
    expect(position[position.length - 1]).toBeCloseTo(-5, 12);
  });
});

describe('pulse kernels', () => {
  it('should build a constant pulse', () => {
    expect(rectangularPulse(2, 0.01, 1000)).toEqual(new Array(10).fill(2));
  });

  it('should build a ramp including both ends', () => {
    expect(linearRamp(0, 1, 0.005, 1000)).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it('should decay over five time constants', () => {
    const kernel = exponentialDecay(2, 0.006, 1000);
    expect(kernel).toHaveLength(6);
    expect(kernel[0]).toBe(2);
    expect(kernel[5]).toBeCloseTo(2 * Math.exp(-5), 12);
  });

  it('should build a Hann window of round(d * fs) points', () => {
    expect(hanningWindow(0.005, 1000)).toEqual(hanning(5));
  });
});
