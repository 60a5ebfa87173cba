/**
 * Motor unit firing model
 *
 * Each sample is a Bernoulli trial with p = rate(I) / fs, where
 * rate(I) = 50 + 450 * I Hz. A hit adds one MUAP scaled by
 * (0.7 + 0.3 * I) * U(0.9, 1.1).
 *
 * @module signal/emg/firing
 */

import { EMG_DEFAULTS } from '../../config/defaults';
import type { TimeBase } from '../../types';
import { muap } from '../kernels';
import type { PlacementTally } from '../placement';
import type { Random } from '../random';

export interface FiringContext {
  random: Random;
  tally: PlacementTally;
}

/**
 * Instantaneous firing rate in Hz
 */
export function firingRate(intensity: number): number {
  return EMG_DEFAULTS.baseRate + EMG_DEFAULTS.rateGain * intensity;
}

/**
 * Fire MUAPs along an intensity envelope of `timeBase.nSamples` values
 */
export function fireMotorUnits(
  timeBase: TimeBase,
  envelope: readonly number[],
  context: FiringContext
): number[] {
  const { samplingRate, nSamples } = timeBase;
  const template = muap(samplingRate);
  const signal = new Array<number>(nSamples).fill(0);
  const [low, high] = EMG_DEFAULTS.amplitudeJitter;

  for (let i = 0; i < nSamples; i++) {
    const intensity = envelope[i];
    if (context.random.chance(firingRate(intensity) / samplingRate)) {
      const gain = (EMG_DEFAULTS.amplitudeBase + EMG_DEFAULTS.amplitudeGain * intensity) * context.random.uniform(low, high);
      context.tally.place(signal, template, i, gain);
    }
  }
  return signal;
}

/**
 * Multiply in place by exp(-rate * t / d)
 */
export function applyFatigue(signal: number[], timeBase: TimeBase, rate: number): number[] {
  for (let i = 0; i < signal.length; i++) {
    signal[i] *= Math.exp((-rate * timeBase.time[i]) / timeBase.duration);
  }
  return signal;
}
