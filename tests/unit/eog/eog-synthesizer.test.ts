/**
 * EOG generation tests
 */

import { describe, it, expect } from 'vitest';
import {
  EogSynthesizer,
  addMicrosaccades,
  blinkProfile,
  mainSequenceDuration,
  mainSequenceVelocity,
  scheduleBlinks,
} from '../../../src/signal/eog';
import { PlacementTally } from '../../../src/signal/placement';
import { Random } from '../../../src/signal/random';
import { makeTimeBase } from '../../../src/signal/time-base';
import type { GazeDirection, PursuitPattern } from '../../../src/types';
import { maxAbs } from '../../../src/utils/math';
import {
  InsufficientDurationError,
  InvalidParameterError,
  UnsupportedTypeError,
} from '../../../src/utils/validation';
import { fromJson } from '../../helpers/json';

function synth(samplingRate: number, duration: number, seed: number = 1): EogSynthesizer {
  return new EogSynthesizer(samplingRate, duration, { random: new Random(seed) });
}

const STILL = { microsaccadeRate: 0, driftAmplitude: 0, tremorAmplitude: 0 };

describe('main sequence', () => {
  it('should lengthen and speed up with amplitude', () => {
    expect(mainSequenceDuration(10)).toBeCloseTo(0.04, 12);
    expect(mainSequenceDuration(-10)).toBeCloseTo(0.04, 12);
    expect(mainSequenceVelocity(-10)).toBe(400);
    expect(mainSequenceVelocity(0)).toBe(200);
  });
});

describe('EogSynthesizer', () => {
  describe('simulateSaccades', () => {
    it('should move to the amplitude and hold it', () => {
      const signal = synth(1000, 1).simulateSaccades({ amplitudes: [20] });

      expect(signal).toHaveLength(1000);
      expect(signal[0]).toBeGreaterThan(0);
      expect(signal[0]).toBeLessThan(1);
      expect(signal[59]).toBeCloseTo(20, 9);
      expect(signal[999]).toBe(20);
      expect(maxAbs(signal)).toBeCloseTo(20, 9);
    });

    it('should accumulate consecutive saccades', () => {
      const signal = synth(1000, 1).simulateSaccades({ amplitudes: [10, -5] });
      expect(signal[60]).toBe(10);
      expect(signal[999]).toBe(5);
    });

    it('should expand scalar parameters', () => {
      const signal = synth(1000, 1).simulateSaccades({ amplitudes: 10, durations: 0.1, directions: 'vertical' });
      expect(signal[99]).toBeCloseTo(10, 9);
      expect(signal[100]).toBe(10);
    });

    it('should carry the direction in the amplitude sign only', () => {
      const horizontal = synth(1000, 1).simulateSaccades({ amplitudes: [10, -5], directions: 'horizontal' });
      const vertical = synth(1000, 1).simulateSaccades({ amplitudes: [10, -5], directions: ['vertical', 'vertical'] });
      expect(vertical).toEqual(horizontal);
      expect(vertical[999]).toBe(5);
    });

    it('should reject lists whose length differs from amplitudes', () => {
      expect(() => synth(1000, 1).simulateSaccades({ amplitudes: [10, 5], durations: [0.05] })).toThrow(
        'durations: has 1 entries but amplitudes has 2'
      );
    });

    it('should reject an unknown direction', () => {
      expect(() =>
        synth(1000, 1).simulateSaccades({ amplitudes: [10], directions: [fromJson<GazeDirection>('"diagonal"')] })
      ).toThrow(UnsupportedTypeError);
    });

    it('should reject non-positive durations and velocities', () => {
      const eog = synth(1000, 1);
      expect(() => eog.simulateSaccades({ amplitudes: [10], durations: [0] })).toThrow('durations[0]: must be greater than 0');
      expect(() => eog.simulateSaccades({ amplitudes: [10], peakVelocities: -1 })).toThrow(InvalidParameterError);
    });

    it('should skip a saccade that runs past the end by default', () => {
      const signal = synth(1000, 0.1).simulateSaccades({ amplitudes: [10, 10] });
      expect(signal[99]).toBe(10);
    });

    it('should place the partial trace under the clip policy', () => {
      const signal = synth(1000, 0.1).simulateSaccades({ amplitudes: [10, 10], boundaryPolicy: 'clip' });
      expect(signal[99]).toBeGreaterThan(10);
      expect(signal[99]).toBeLessThan(20);
    });
  });

  describe('generate', () => {
    it('should default to five random saccades', () => {
      const signal = synth(250, 4).generate({ randomSeed: 9 });
      expect(signal).toHaveLength(1000);
      expect(maxAbs(signal)).toBeGreaterThan(0);
    });

    it('should produce a flat trace for zero amplitude', () => {
      const signal = synth(250, 1).generate({ movementType: 'saccades', amplitude: 0 });
      expect(signal.every(v => v === 0)).toBe(true);
    });

    it('should pass explicit amplitudes through', () => {
      const viaGenerate = synth(1000, 1).generate({ amplitudes: [20] });
      expect(viaGenerate).toEqual(synth(1000, 1).simulateSaccades({ amplitudes: [20] }));
    });

    it('should reject a pursuit pattern for saccades', () => {
      expect(() => synth(250, 1).generate({ movementType: 'saccades', pattern: 'sinusoidal' })).toThrow(
        UnsupportedTypeError
      );
    });

    it('should reject an unknown movement type', () => {
      expect(() => synth(250, 1).generate({ movementType: fromJson<'saccades'>('"vergence"') })).toThrow(
        UnsupportedTypeError
      );
    });

    it('should add blinks on top of the movement', () => {
      const signal = synth(250, 2).generate({
        movementType: 'fixation',
        ...STILL,
        addBlinks: true,
        nBlinks: 1,
        naturalVariability: false,
      });
      expect(Math.max(...signal)).toBeGreaterThan(1.19);
      expect(Math.max(...signal)).toBeLessThanOrEqual(1.2);
    });
  });

  describe('simulateSmoothPursuit', () => {
    it('should follow a sine', () => {
      const signal = synth(100, 2).simulateSmoothPursuit({ pattern: 'sinusoidal', amplitude: 10, frequency: 0.5 });
      expect(signal[0]).toBe(0);
      expect(signal[50]).toBeCloseTo(10, 9);
    });

    it('should take cosine for the horizontal circular component', () => {
      const horizontal = synth(100, 1).simulateSmoothPursuit({ pattern: 'circular', amplitude: 5 });
      const vertical = synth(100, 1).simulateSmoothPursuit({ pattern: 'circular', amplitude: 5, direction: 'vertical' });
      expect(horizontal[0]).toBe(5);
      expect(vertical[0]).toBe(0);
    });

    it('should sweep a sawtooth with a catch-up saccade before each reset', () => {
      const signal = synth(100, 4).simulateSmoothPursuit({ pattern: 'linear', amplitude: 10, frequency: 0.5 });
      expect(signal[0]).toBe(-10);
      expect(signal[100]).toBe(0);
      // 9.9 on the ramp plus the completed 1 degree catch-up
      expect(signal[199]).toBeCloseTo(10.9, 9);
      expect(signal[200]).toBe(-10);
    });

    it('should resample a custom trajectory', () => {
      const signal = synth(100, 0.05).simulateSmoothPursuit({ pattern: 'custom', customTrajectory: [0, 10] });
      expect(signal).toEqual([0, 2.5, 5, 7.5, 10]);
    });

    it('should require at least two custom points', () => {
      expect(() => synth(100, 1).simulateSmoothPursuit({ pattern: 'custom', customTrajectory: [1] })).toThrow(
        'customTrajectory: needs at least 2 points for a custom pursuit'
      );
      expect(() => synth(100, 1).simulateSmoothPursuit({ pattern: 'custom' })).toThrow(InvalidParameterError);
    });

    it('should reject a non-positive frequency', () => {
      expect(() => synth(100, 1).simulateSmoothPursuit({ frequency: 0 })).toThrow('frequency: must be greater than 0');
    });

    it.each<PursuitPattern>(['linear', 'sinusoidal', 'circular'])('should be reachable through generate (%s)', pattern => {
      expect(synth(100, 2).generate({ movementType: 'pursuit', pattern })).toHaveLength(200);
    });
  });

  describe('simulateFixation', () => {
    it('should be flat with every component disabled', () => {
      const signal = synth(250, 1).simulateFixation(STILL);
      expect(signal.every(v => v === 0)).toBe(true);
    });

    it('should add tremor and its half-amplitude harmonic', () => {
      const signal = synth(1000, 1).simulateFixation({ ...STILL, tremorAmplitude: 1, tremorFrequency: 10 });
      expect(signal[25]).toBeCloseTo(1, 9);
      expect(signal[0]).toBe(0);
    });

    it('should wander with drift', () => {
      const signal = synth(250, 2).simulateFixation({ ...STILL, driftAmplitude: 0.5 });
      expect(maxAbs(signal)).toBeGreaterThan(0);
    });

    it('should reject a negative rate', () => {
      expect(() => synth(250, 1).simulateFixation({ microsaccadeRate: -1 })).toThrow(
        'microsaccadeRate: cannot be negative'
      );
    });
  });

  describe('addMicrosaccades', () => {
    const timeBase = makeTimeBase(1000, 2);

    it('should draw nothing at rate 0', () => {
      const buffer = new Array<number>(2000).fill(0);
      const context = { timeBase, random: new Random(1), tally: new PlacementTally('skip') };
      expect(addMicrosaccades(buffer, 0, 0.2, context)).toBe(0);
      expect(buffer.every(v => v === 0)).toBe(true);
    });

    it('should shift gaze by at most the amplitude per event', () => {
      const buffer = new Array<number>(2000).fill(0);
      const context = { timeBase, random: new Random(2), tally: new PlacementTally('skip') };
      const count = addMicrosaccades(buffer, 20, 0.2, context);
      expect(count).toBeGreaterThan(0);
      expect(maxAbs(buffer)).toBeLessThanOrEqual(0.2 * count + 1e-9);
    });
  });

  describe('blinks', () => {
    it('should close faster than it opens', () => {
      const profile = blinkProfile(2, 0.2, 100);
      expect(profile).toHaveLength(20);
      expect(profile[0]).toBeCloseTo(2 * Math.exp(-9), 12);
      expect(profile[19]).toBeCloseTo(2 * Math.exp(-2.25), 12);
      expect(Math.max(...profile)).toBeGreaterThan(1.9);
      expect(Math.max(...profile)).toBeLessThan(2);
    });

    it('should schedule sorted starts at least minInterval apart', () => {
      const starts = scheduleBlinks(4, 9, 1, new Random(4));
      expect(starts).toHaveLength(4);
      for (let i = 1; i < starts.length; i++) {
        expect(starts[i] - starts[i - 1]).toBeGreaterThan(1 - 1e-9);
      }
      expect(starts[0]).toBeGreaterThanOrEqual(0);
      expect(starts[3]).toBeLessThanOrEqual(9);
    });

    it('should place every blink when the spacing exactly fills the duration', () => {
      for (let seed = 0; seed < 200; seed++) {
        const { blinks } = new EogSynthesizer(1000, 1.6, { random: new Random(seed) }).simulateBlinkEvents({
          nBlinks: 3,
          blinkDuration: 0.2,
          minInterval: 0.5,
        });

        expect(blinks).toHaveLength(3);
        expect(blinks[1].start - blinks[0].start).toBeGreaterThan(0.5 - 1e-9);
        expect(blinks[2].start - blinks[1].start).toBeGreaterThan(0.5 - 1e-9);
        expect(blinks[2].start).toBeLessThanOrEqual(1.6 - 0.2 * 1.2);
      }
    });

    it('should stack blinks back to back when there is no slack', () => {
      expect(scheduleBlinks(3, 1, 0.5, new Random(2))).toEqual([0, 0.5, 1]);
    });

    it('should give up when the blinks cannot be spread out', () => {
      expect(() => scheduleBlinks(3, 0.5, 1, new Random(1))).toThrow(InsufficientDurationError);
    });

    it('should reject blinks that cannot fit the duration', () => {
      expect(() => synth(250, 1).simulateBlinks({ nBlinks: 3 })).toThrow(InsufficientDurationError);
    });

    it('should return zeros without blinks', () => {
      const { signal, blinks } = synth(250, 1).simulateBlinkEvents({ nBlinks: 0 });
      expect(blinks).toEqual([]);
      expect(signal.every(v => v === 0)).toBe(true);
    });

    it('should keep drawn blinks within their ranges', () => {
      const { blinks } = synth(250, 10, 6).simulateBlinkEvents({ nBlinks: 4 });

      expect(blinks).toHaveLength(4);
      blinks.forEach((blink, i) => {
        expect(blink.start).toBeGreaterThanOrEqual(0);
        expect(blink.start).toBeLessThanOrEqual(10 - 0.24);
        expect(blink.duration).toBeGreaterThanOrEqual(0.16);
        expect(blink.duration).toBeLessThanOrEqual(0.24);
        expect(blink.amplitude).toBeGreaterThanOrEqual(0.8 * 0.3);
        expect(blink.amplitude).toBeLessThanOrEqual(1.2);
        if (i > 0) expect(blink.start - blinks[i - 1].start).toBeGreaterThan(0.5 - 1e-9);
      });
    });

    it('should use the fixed duration and top amplitude without variability', () => {
      const { blinks } = synth(250, 5).simulateBlinkEvents({ nBlinks: 2, naturalVariability: false });
      expect(blinks.map(b => [b.duration, b.amplitude])).toEqual([
        [0.2, 1.2],
        [0.2, 1.2],
      ]);
    });

    it('should reject a descending amplitude range', () => {
      expect(() => synth(250, 5).simulateBlinks({ amplitudeRange: [1.2, 0.8] })).toThrow(
        'amplitudeRange: must be ascending [min, max]'
      );
    });
  });
});
