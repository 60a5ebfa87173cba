/**
 * Interference from other sources
 * @module signal/noise/interference
 */

import {
  BURST_DEFAULTS,
  INTERFERENCE_DEFAULTS,
  NOISE_DEFAULTS,
  PARAMETER_RANGES,
} from '../../config/defaults';
import type { InterferenceType, NoiseParams } from '../../types';
import { hanning } from '../../utils/math';
import {
  requireFinite,
  requireInRange,
  requireInteger,
  requirePositive,
} from '../../utils/validation';
import { linearRamp } from '../kernels';
import { addConstant } from '../placement';
import { burstSettings, burstTone, placeBursts } from './bursts';
import type { NoiseContext, NoiseStrategy } from './bursts';

/**
 * Keep a random tone band below Nyquist
 */
function toneBand(band: readonly [number, number], samplingRate: number): [number, number] {
  const upper = Math.min(band[1], samplingRate / 2);
  return [Math.min(band[0], upper), upper];
}

function emgCrosstalk(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
  const settings = burstSettings(params, BURST_DEFAULTS.emg, context.timeBase, params.nBursts);
  const [low, high] = toneBand(INTERFERENCE_DEFAULTS.emgBand, context.timeBase.samplingRate);

  return placeBursts(context, settings, (samples, duration) => {
    const burst = new Array<number>(samples).fill(0);
    for (let tone = 0; tone < INTERFERENCE_DEFAULTS.emgTones; tone++) {
      const frequency = context.random.uniform(low, high);
      const phase = context.random.uniform(0, 2 * Math.PI);
      const wave = burstTone(samples, duration, frequency, phase);
      for (let i = 0; i < samples; i++) {
        burst[i] += wave[i];
      }
    }
    const envelope = hanning(samples);
    return burst.map((v, i) => amplitude * envelope[i] * v);
  });
}

/**
 * Piecewise-linear QRS-like spike, 100 ms long
 */
function interferingQrs(amplitude: number, samplingRate: number): number[] {
  return [
    ...linearRamp(0, -0.2, 0.02, samplingRate),
    ...linearRamp(-0.2, 1, 0.01, samplingRate),
    ...linearRamp(1, -0.3, 0.01, samplingRate),
    ...linearRamp(-0.3, 0, 0.06, samplingRate),
  ].map(v => amplitude * v);
}

function ecgCrosstalk({ timeBase, tally }: NoiseContext, params: NoiseParams): number[] {
  const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
  const range = PARAMETER_RANGES.heartRate;
  const heartRate = requireInRange(params.heartRate ?? INTERFERENCE_DEFAULTS.heartRate, 'heartRate', range.min, range.max);

  const signal = new Array<number>(timeBase.nSamples).fill(0);
  const spike = interferingQrs(amplitude, timeBase.samplingRate);
  const interval = 60 / heartRate;
  for (let t = 0; t < timeBase.duration; t += interval) {
    tally.place(signal, spike, Math.round(t * timeBase.samplingRate));
  }
  return signal;
}

function environmental({ timeBase, random }: NoiseContext, params: NoiseParams): number[] {
  const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
  const mains = requirePositive(params.frequency ?? NOISE_DEFAULTS.powerlineFrequency, 'frequency');

  const frequencies: number[] = [];
  const gains: number[] = [];
  for (let h = 1; h <= INTERFERENCE_DEFAULTS.environmentalHarmonics; h++) {
    frequencies.push(mains * h);
    gains.push(amplitude / h);
  }
  const [low, high] = toneBand(INTERFERENCE_DEFAULTS.environmentalBand, timeBase.samplingRate);
  for (let i = 0; i < INTERFERENCE_DEFAULTS.environmentalTones; i++) {
    frequencies.push(random.uniform(low, high));
    gains.push(amplitude * 0.1);
  }

  return timeBase.time.map(t =>
    frequencies.reduce((sum, frequency, k) => sum + gains[k] * Math.sin(2 * Math.PI * frequency * t), 0)
  );
}

function device({ timeBase, random }: NoiseContext, params: NoiseParams): number[] {
  const amplitude = requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
  const switching = requirePositive(params.switchingFreq ?? INTERFERENCE_DEFAULTS.switchingFreq, 'switchingFreq');
  const dutyRange = PARAMETER_RANGES.dutyCycle;
  const duty = requireInRange(params.dutyCycle ?? INTERFERENCE_DEFAULTS.dutyCycle, 'dutyCycle', dutyRange.min, dutyRange.max);
  const spikes = requireInteger(params.nSpikes ?? INTERFERENCE_DEFAULTS.nSpikes, 'nSpikes');

  const signal = timeBase.time.map(t => {
    const cycle = switching * t - Math.floor(switching * t);
    return amplitude * 0.5 * (cycle < duty ? 1 : -1);
  });

  if (timeBase.nSamples > 10) {
    for (let i = 0; i < spikes; i++) {
      const start = random.integer(0, timeBase.nSamples - 10);
      const width = random.integer(5, 10);
      addConstant(signal, amplitude * random.uniform(0.5, 1), start, start + width);
    }
  }
  return signal;
}

export const INTERFERENCE_STRATEGIES: Record<InterferenceType, NoiseStrategy> = {
  emg: emgCrosstalk,
  ecg: ecgCrosstalk,
  environmental,
  device,
};
