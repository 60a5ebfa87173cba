/**
 * Broadband and tonal noise
 * @module signal/noise/spectra
 */

import { NOISE_DEFAULTS } from '../../config/defaults';
import type { NoiseParams, NoiseType } from '../../types';
import { nextPowerOfTwo } from '../../utils/math';
import {
  InvalidParameterError,
  requireFinite,
  requireInteger,
  requireNonNegative,
  requirePositive,
} from '../../utils/validation';
import { fftFrequencies, inverseReal } from '../fft';
import type { Random } from '../random';
import type { NoiseContext, NoiseStrategy } from './bursts';

function gaussian({ timeBase, random }: NoiseContext, params: NoiseParams): number[] {
  const std = requireNonNegative(params.std ?? NOISE_DEFAULTS.std, 'std');
  const noise = new Array<number>(timeBase.nSamples);
  for (let i = 0; i < noise.length; i++) {
    noise[i] = std === 0 ? 0 : random.normal(0, std);
  }
  return noise;
}

/**
 * Random-phase noise whose power falls off as 1 / |f|^exponent
 */
export function coloredNoise(length: number, exponent: number, random: Random): number[] {
  const size = nextPowerOfTwo(length);
  const frequencies = fftFrequencies(size);
  const spectrum = new Array<number>(2 * size).fill(0);

  for (let k = 0; k < size; k++) {
    const phase = random.uniform(0, 2 * Math.PI);
    if (frequencies[k] === 0) continue;
    const magnitude = Math.sqrt(1 / Math.pow(Math.abs(frequencies[k]), exponent));
    spectrum[2 * k] = magnitude * Math.cos(phase);
    spectrum[2 * k + 1] = magnitude * Math.sin(phase);
  }

  return inverseReal(spectrum).slice(0, length);
}

function colored(exponent: number): NoiseStrategy {
  return ({ timeBase, random }, params) => {
    const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
    return coloredNoise(timeBase.nSamples, exponent, random).map(v => amplitude * v);
  };
}

function powerline({ timeBase }: NoiseContext, params: NoiseParams): number[] {
  const frequency = requirePositive(params.frequency ?? NOISE_DEFAULTS.powerlineFrequency, 'frequency');
  const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
  const harmonics = requireInteger(params.harmonics ?? NOISE_DEFAULTS.harmonics, 'harmonics', 1);

  return timeBase.time.map(t => {
    let value = 0;
    for (let h = 1; h <= harmonics; h++) {
      value += (amplitude / h) * Math.sin(2 * Math.PI * frequency * h * t);
    }
    return value;
  });
}

function baselineWander({ timeBase, random }: NoiseContext, params: NoiseParams): number[] {
  const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
  const drift = requirePositive(params.driftFrequency ?? NOISE_DEFAULTS.driftFrequency, 'driftFrequency');

  const noise = new Array<number>(timeBase.nSamples).fill(0);
  for (const frequency of [drift, drift / 2, drift / 3]) {
    const phase = random.uniform(0, 2 * Math.PI);
    for (let i = 0; i < noise.length; i++) {
      noise[i] += (amplitude / 3) * Math.sin(2 * Math.PI * frequency * timeBase.time[i] + phase);
    }
  }
  return noise;
}

function highFrequency({ timeBase, random }: NoiseContext, params: NoiseParams): number[] {
  const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
  const minFreq = requireNonNegative(params.minFreq ?? NOISE_DEFAULTS.minFreq, 'minFreq');
  const maxFreq = requirePositive(params.maxFreq ?? NOISE_DEFAULTS.maxFreq, 'maxFreq');
  const components = requireInteger(params.nComponents ?? NOISE_DEFAULTS.nComponents, 'nComponents', 1);
  if (maxFreq < minFreq) {
    throw new InvalidParameterError(`must not be below minFreq (${minFreq})`, 'maxFreq', maxFreq);
  }

  const noise = new Array<number>(timeBase.nSamples).fill(0);
  for (let c = 0; c < components; c++) {
    const frequency = random.uniform(minFreq, maxFreq);
    const phase = random.uniform(0, 2 * Math.PI);
    for (let i = 0; i < noise.length; i++) {
      noise[i] += (amplitude / components) * Math.sin(2 * Math.PI * frequency * timeBase.time[i] + phase);
    }
  }
  return noise;
}

export const NOISE_STRATEGIES: Record<NoiseType, NoiseStrategy> = {
  gaussian,
  pink: colored(1),
  brown: colored(2),
  powerline,
  baseline_wander: baselineWander,
  high_frequency: highFrequency,
};
