/**
 * One lookup table for every noise and artifact type
 * @module signal/noise/strategies
 */

import { ALL_NOISE_TYPES } from '../../types';
import type { AnyNoiseType, NoiseParams } from '../../types';
import { requireOneOf } from '../../utils/validation';
import { ELECTRODE_STRATEGIES, MOTION_STRATEGIES } from './artifacts';
import type { NoiseContext, NoiseStrategy } from './bursts';
import { INTERFERENCE_STRATEGIES } from './interference';
import { NOISE_STRATEGIES } from './spectra';

export const ALL_NOISE_STRATEGIES: Record<AnyNoiseType, NoiseStrategy> = {
  ...NOISE_STRATEGIES,
  ...MOTION_STRATEGIES,
  ...INTERFERENCE_STRATEGIES,
  ...ELECTRODE_STRATEGIES,
};

/**
 * Validate `noiseType` and run its strategy
 */
export function runNoiseStrategy(noiseType: unknown, context: NoiseContext, params: NoiseParams): number[] {
  const type = requireOneOf(noiseType, 'noiseType', ALL_NOISE_TYPES);
  return ALL_NOISE_STRATEGIES[type](context, params);
}
