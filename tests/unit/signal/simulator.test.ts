/**
 * Simulator facade tests
 */

import { describe, it, expect } from 'vitest';
import { EcgSynthesizer } from '../../../src/signal/ecg';
import { EmgSynthesizer } from '../../../src/signal/emg';
import { EogSynthesizer } from '../../../src/signal/eog';
import { BiosignalSimulator, createSynthesizer } from '../../../src/signal/simulator';
import type { SignalFamily } from '../../../src/types';
import { LogLevel, Logger, type LogEntry } from '../../../src/utils/logger';
import { InvalidParameterError, UnsupportedTypeError } from '../../../src/utils/validation';
import { fromJson } from '../../helpers/json';

describe('createSynthesizer', () => {
  it('should build the synthesizer for each family', () => {
    expect(createSynthesizer('emg', 1000, 1)).toBeInstanceOf(EmgSynthesizer);
    expect(createSynthesizer('ecg', 500, 1)).toBeInstanceOf(EcgSynthesizer);
    expect(createSynthesizer('eog', 250, 1).timeBase.nSamples).toBe(250);
    expect(createSynthesizer('noise', 100, 2).family).toBe('noise');
  });

  it('should reject an unknown family', () => {
    expect(() => createSynthesizer(fromJson<SignalFamily>('"eeg"'), 100, 1)).toThrow(UnsupportedTypeError);
  });
});

describe('BiosignalSimulator', () => {
  it('should validate the grid on construction', () => {
    expect(() => new BiosignalSimulator(0, 1)).toThrow(InvalidParameterError);
  });

  it('should create each synthesizer once', () => {
    const sim = new BiosignalSimulator(500, 1);
    const ecg = sim.synthesizer('ecg');
    expect(ecg).toBeInstanceOf(EcgSynthesizer);
    expect(sim.synthesizer('ecg')).toBe(ecg);
    expect(sim.synthesizer('eog')).toBeInstanceOf(EogSynthesizer);
  });

  it('should reproduce a composition from the same seed', () => {
    const request = {
      family: 'ecg',
      params: { condition: 'af' },
      noise: [{ noiseType: 'gaussian', params: { std: 0.05 } }],
      artifacts: [{ artifactType: 'spike', startTime: 0.5, duration: 0.01, amplitude: 3 }],
      randomSeed: 7,
    } as const;

    const first = new BiosignalSimulator(500, 2).generate(request);
    const second = new BiosignalSimulator(500, 2).generate(request);
    expect(second).toEqual(first);
  });

  it('should reproduce a composition from the constructor seed', () => {
    const first = new BiosignalSimulator(1000, 1, { seed: 3 }).generate({ family: 'emg' });
    const second = new BiosignalSimulator(1000, 1, { seed: 3 }).generate({ family: 'emg' });
    expect(second).toEqual(first);
  });

  it('should add noise layers on top of the base signal', () => {
    const clean = new BiosignalSimulator(1000, 1).generate({ family: 'ecg', params: { heartRate: 60 } });
    const noisy = new BiosignalSimulator(1000, 1).generate({
      family: 'ecg',
      params: { heartRate: 60 },
      noise: [{ noiseType: 'powerline' }],
    });
    // t = 5 ms: sin(pi / 2) for 50 Hz, sin(pi) for the harmonic
    expect(noisy[5] - clean[5]).toBeCloseTo(0.1, 10);
  });

  it('should apply artifacts after the base signal', () => {
    const signal = new BiosignalSimulator(100, 1).generate({
      family: 'noise',
      params: { noiseType: 'gaussian', std: 0 },
      artifacts: [{ artifactType: 'step', startTime: 0.2, duration: 0.1, amplitude: 2 }],
    });
    expect(signal.slice(19, 31)).toEqual([0, 2, 2, 2, 2, 2, 2, 2, 2, 2, 2, 0]);
  });

  it('should log the composition through child loggers', () => {
    const entries: LogEntry[] = [];
    const logger = new Logger('sim', { minLevel: LogLevel.DEBUG, outputHandler: entry => entries.push(entry) });
    const sim = new BiosignalSimulator(100, 1, { logger });

    sim.generate({
      family: 'noise',
      params: { noiseType: 'pink' },
      artifacts: [{ artifactType: 'spike', startTime: 0.1, duration: 0.01 }],
    });

    expect(entries.find(e => e.message === 'generated')?.module).toBe('sim:noise');
    expect(entries.find(e => e.message === 'composed')?.context).toEqual({
      family: 'noise',
      noiseLayers: 0,
      artifacts: 1,
    });
  });
});
