/**
 * Shared synthesizer behaviour: seeding, policies and overlays
 */

import { describe, it, expect } from 'vitest';
import { EcgSynthesizer } from '../../../src/signal/ecg';
import { NoiseSynthesizer } from '../../../src/signal/noise';
import { Random } from '../../../src/signal/random';
import { LogLevel, type LogEntry, Logger } from '../../../src/utils/logger';
import type { AnyNoiseType, ArtifactType, BoundaryPolicy } from '../../../src/types';
import { InvalidParameterError, UnsupportedTypeError } from '../../../src/utils/validation';
import { fromJson } from '../../helpers/json';

function flat(length: number): number[] {
  return new Array<number>(length).fill(0);
}

describe('Synthesizer', () => {
  describe('construction', () => {
    it('should expose the time base', () => {
      const synth = new NoiseSynthesizer(250, 2);
      expect(synth.timeBase.nSamples).toBe(500);
      expect(synth.family).toBe('noise');
    });

    it('should reject a bad grid', () => {
      expect(() => new NoiseSynthesizer(0, 1)).toThrow(InvalidParameterError);
      expect(() => new NoiseSynthesizer(100, 0.001)).toThrow(InvalidParameterError);
    });

    it('should reject an unknown boundary policy', () => {
      expect(() => new NoiseSynthesizer(100, 1, { boundaryPolicy: fromJson<BoundaryPolicy>('"wrap"') })).toThrow(UnsupportedTypeError);
    });
  });

  describe('seeding', () => {
    it('should reproduce a signal for the same seed', () => {
      const synth = new NoiseSynthesizer(100, 1, { random: new Random() });
      const first = synth.generate({ noiseType: 'gaussian', randomSeed: 11 });
      const second = synth.generate({ noiseType: 'gaussian', randomSeed: 11 });
      expect(second).toEqual(first);
    });

    it('should reproduce across instances with their own generators', () => {
      const a = new NoiseSynthesizer(100, 1, { random: new Random(5) });
      const b = new NoiseSynthesizer(100, 1, { random: new Random(5) });
      expect(a.generate({ noiseType: 'pink' })).toEqual(b.generate({ noiseType: 'pink' }));
    });

    it('should differ for different seeds', () => {
      const synth = new NoiseSynthesizer(100, 1, { random: new Random() });
      const first = synth.generate({ randomSeed: 1 });
      const second = synth.generate({ randomSeed: 2 });
      expect(second).not.toEqual(first);
    });
  });

  describe('logging', () => {
    it('should log one timed entry per generation', () => {
      const entries: LogEntry[] = [];
      const logger = new Logger('noise', { minLevel: LogLevel.DEBUG, outputHandler: entry => entries.push(entry) });
      const synth = new NoiseSynthesizer(100, 1, { logger, random: new Random(1) });

      synth.generate({ noiseType: 'powerline' });

      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe('generated');
      expect(entries[0].context).toMatchObject({ variant: 'powerline', samples: 100 });
    });

    it('should report kernels dropped at the edge', () => {
      const entries: LogEntry[] = [];
      const logger = new Logger('ecg', { minLevel: LogLevel.DEBUG, outputHandler: entry => entries.push(entry) });
      const synth = new EcgSynthesizer(500, 1, { logger, random: new Random(1) });

      // One beat at t = 0 whose 0.9 s T wave starts at 0.36 s
      synth.generate({ heartRate: 60, tWave: { duration: 0.9 } });

      const dropped = entries.find(e => e.message === 'dropped kernels outside the buffer');
      expect(dropped?.context).toEqual({ variant: 'normal', dropped: 1, placed: 2 });
    });
  });

  describe('addNoise', () => {
    it('should add a powerline layer with overlay defaults', () => {
      const synth = new NoiseSynthesizer(1000, 1);
      const noisy = synth.addNoise(flat(1000), 'powerline');
      // t = 5 ms: sin(pi / 2) for 50 Hz, sin(pi) for the harmonic
      expect(noisy[5]).toBeCloseTo(0.1, 10);
    });

    it('should leave the signal unchanged for zero-std gaussian noise', () => {
      const synth = new NoiseSynthesizer(100, 1);
      const signal = Array.from({ length: 100 }, (_, i) => i);
      expect(synth.addNoise(signal, 'gaussian', { std: 0 })).toEqual(signal);
    });

    it('should not mutate its input', () => {
      const synth = new NoiseSynthesizer(100, 1, { random: new Random(3) });
      const signal = flat(100);
      synth.addNoise(signal, 'gaussian');
      expect(signal).toEqual(flat(100));
    });

    it('should accept artifact and interference types', () => {
      const synth = new NoiseSynthesizer(100, 2, { random: new Random(3) });
      expect(synth.addNoise(flat(200), 'electrode_pop')).toHaveLength(200);
      expect(synth.addNoise(flat(200), 'device')).toHaveLength(200);
    });

    it('should reject unknown types and wrong lengths', () => {
      const synth = new NoiseSynthesizer(100, 1);
      expect(() => synth.addNoise(flat(100), fromJson<AnyNoiseType>('"blue"'))).toThrow(UnsupportedTypeError);
      expect(() => synth.addNoise(flat(99), 'gaussian')).toThrow(InvalidParameterError);
    });
  });

  describe('addArtifact', () => {
    const synth = new NoiseSynthesizer(100, 1);

    it('should add a single-sample spike', () => {
      const output = synth.addArtifact(flat(100), 'spike', 0.5, 0.1, 3);
      expect(output[50]).toBe(3);
      expect(output.filter(v => v !== 0)).toEqual([3]);
    });

    it('should add a step over the window', () => {
      const output = synth.addArtifact(flat(100), 'step', 0.2, 0.1, 2);
      expect(output.slice(19, 31)).toEqual([0, 2, 2, 2, 2, 2, 2, 2, 2, 2, 2, 0]);
    });

    it('should clip a ramp at the end of the signal', () => {
      const output = synth.addArtifact(flat(100), 'ramp', 0.9, 0.2);
      expect(output[89]).toBe(0);
      expect(output[90]).toBe(0);
      expect(output[99]).toBeCloseTo(9 / 19, 12);
    });

    it('should add an exponential decay', () => {
      const output = synth.addArtifact(flat(100), 'exponential_decay', 0, 0.05, 1);
      expect(output[0]).toBe(1);
      expect(output[1]).toBeCloseTo(Math.exp(-1.25), 12);
      expect(output[5]).toBe(0);
    });

    it('should default the amplitude to 1', () => {
      expect(synth.addArtifact(flat(100), 'spike', 0, 0.01)[0]).toBe(1);
    });

    it('should not mutate its input', () => {
      const signal = flat(100);
      synth.addArtifact(signal, 'step', 0, 0.5);
      expect(signal).toEqual(flat(100));
    });

    it('should reject a start outside [0, D)', () => {
      expect(() => synth.addArtifact(flat(100), 'spike', 1, 0.1)).toThrow(InvalidParameterError);
      expect(() => synth.addArtifact(flat(100), 'spike', -0.1, 0.1)).toThrow(InvalidParameterError);
    });

    it('should reject a non-positive duration', () => {
      expect(() => synth.addArtifact(flat(100), 'step', 0.1, 0)).toThrow('duration: must be greater than 0');
    });

    it('should reject unknown types and wrong lengths', () => {
      expect(() => synth.addArtifact(flat(100), fromJson<ArtifactType>('"glitch"'), 0.1, 0.1)).toThrow(UnsupportedTypeError);
      expect(() => synth.addArtifact(flat(10), 'spike', 0.1, 0.1)).toThrow(InvalidParameterError);
    });
  });
});
