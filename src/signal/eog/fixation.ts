/**
 * Fixational eye movements: slow drift, tremor and microsaccades
 *
 * @module signal/eog/fixation
 */

import { FIXATION_DEFAULTS } from '../../config/defaults';
import { cumulativeSum } from '../../utils/math';
import { mainSequenceVelocity, placeSaccade, type EogContext } from './saccades';

export interface FixationSettings {
  microsaccadeRate: number;
  microsaccadeAmplitude: number;
  driftAmplitude: number;
  tremorAmplitude: number;
  tremorFrequency: number;
}

/**
 * Random walk whose per-sample velocity has std drift / D
 */
export function drift(amplitude: number, context: EogContext): number[] {
  const { nSamples, samplingRate, duration } = context.timeBase;
  const velocity = Array.from({ length: nSamples }, () => context.random.normal(0, amplitude / duration));
  return cumulativeSum(velocity).map(v => v / samplingRate);
}

/**
 * Tremor at f plus its second harmonic at half amplitude
 */
export function tremor(amplitude: number, frequency: number, context: EogContext): number[] {
  const { nSamples, samplingRate } = context.timeBase;
  const omega = 2 * Math.PI * frequency;
  return Array.from({ length: nSamples }, (_, i) => {
    const t = i / samplingRate;
    return amplitude * Math.sin(omega * t) + 0.5 * amplitude * Math.sin(2 * omega * t);
  });
}

/**
 * Poisson-timed microsaccades, each shifting gaze by U(-a, a)
 *
 * @returns Number of microsaccades drawn
 */
export function addMicrosaccades(
  buffer: number[],
  rate: number,
  amplitude: number,
  context: EogContext
): number {
  if (rate <= 0) return 0;

  const { duration, samplingRate } = context.timeBase;
  const length = FIXATION_DEFAULTS.microsaccadeDuration;
  let count = 0;
  for (let t = context.random.exponential(rate); t < duration - length; t += context.random.exponential(rate)) {
    const shift = context.random.uniform(-amplitude, amplitude);
    placeSaccade(
      buffer,
      { amplitude: shift, direction: 'horizontal', duration: length, peakVelocity: mainSequenceVelocity(shift) },
      Math.round(t * samplingRate),
      context
    );
    count++;
  }
  return count;
}

export function renderFixation(settings: FixationSettings, context: EogContext): number[] {
  const signal = drift(settings.driftAmplitude, context);
  const shake = tremor(settings.tremorAmplitude, settings.tremorFrequency, context);
  for (let i = 0; i < signal.length; i++) {
    signal[i] += shake[i];
  }
  addMicrosaccades(signal, settings.microsaccadeRate, settings.microsaccadeAmplitude, context);
  return signal;
}
