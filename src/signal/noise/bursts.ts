/**
 * Shared plumbing for noise strategies
 * @module signal/noise/bursts
 */

import type { NoiseParams, TimeBase } from '../../types';
import { InvalidParameterError, requireInteger, requirePositive } from '../../utils/validation';
import type { PlacementTally } from '../placement';
import type { Random } from '../random';

/**
 * Everything a noise strategy may read while it fills a buffer
 */
export interface NoiseContext {
  timeBase: TimeBase;
  random: Random;
  tally: PlacementTally;
}

/**
 * Produces a fresh buffer of `timeBase.nSamples` samples
 */
export type NoiseStrategy = (context: NoiseContext, params: NoiseParams) => number[];

export interface BurstSettings {
  count: number;
  duration: number;
}

/**
 * Builds one burst of `samples` points spanning `duration` seconds
 */
export type BurstBuilder = (samples: number, duration: number) => number[];

/**
 * Resolve and validate the burst count and length
 */
export function burstSettings(
  params: NoiseParams,
  defaults: BurstSettings,
  timeBase: TimeBase,
  countAlias?: number
): BurstSettings {
  const count = requireInteger(params.nEvents ?? countAlias ?? defaults.count, 'nEvents');
  const duration = requirePositive(params.duration ?? defaults.duration, 'duration');
  if (duration >= timeBase.duration) {
    throw new InvalidParameterError(
      `burst of ${duration} s does not fit in ${timeBase.duration} s`,
      'duration',
      duration
    );
  }
  return { count, duration };
}

/**
 * Place `count` bursts at start times drawn from U(0, D - burst)
 */
export function placeBursts(
  context: NoiseContext,
  settings: BurstSettings,
  build: BurstBuilder
): number[] {
  const { timeBase, random, tally } = context;
  const buffer = new Array<number>(timeBase.nSamples).fill(0);
  const samples = Math.round(settings.duration * timeBase.samplingRate);

  for (let i = 0; i < settings.count; i++) {
    const start = Math.round(random.uniform(0, timeBase.duration - settings.duration) * timeBase.samplingRate);
    tally.place(buffer, build(samples, settings.duration), start);
  }
  return buffer;
}

/**
 * sin(2 pi f t + phase) on the inclusive burst grid
 */
export function burstTone(samples: number, duration: number, frequency: number, phase: number = 0): number[] {
  const step = samples > 1 ? duration / (samples - 1) : 0;
  const tone = new Array<number>(samples);
  for (let i = 0; i < samples; i++) {
    tone[i] = Math.sin(2 * Math.PI * frequency * i * step + phase);
  }
  return tone;
}
