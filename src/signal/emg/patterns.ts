/**
 * Activation envelopes and segment builders
 *
 * Every builder works on the time base it is handed, so complex patterns
 * can render each movement on its own segment grid.
 *
 * @module signal/emg/patterns
 */

import { EMG_DEFAULTS } from '../../config/defaults';
import type { EmgMovementType, EmgRampType, TimeBase } from '../../types';
import { resampleLinear } from '../../utils/math';
import { fireMotorUnits, type FiringContext } from './firing';

export interface RepetitiveSettings {
  frequency: number;
  dutyCycle: number;
  intensity: number;
  restIntensity: number;
}

export function constantEnvelope(timeBase: TimeBase, intensity: number): number[] {
  return new Array<number>(timeBase.nSamples).fill(intensity);
}

/**
 * Ramp from 0 to `maxIntensity`, or a raised sine oscillating between 0 and it
 */
export function rampEnvelope(
  timeBase: TimeBase,
  rampType: EmgRampType,
  maxIntensity: number,
  frequency: number = EMG_DEFAULTS.dynamic.frequency
): number[] {
  return timeBase.time.map(t =>
    rampType === 'ramp'
      ? (t / timeBase.duration) * maxIntensity
      : (maxIntensity / 2) * (1 + Math.sin(2 * Math.PI * frequency * t))
  );
}

/**
 * Caller-supplied envelope stretched to the time base
 */
export function customEnvelope(timeBase: TimeBase, envelope: readonly number[]): number[] {
  return resampleLinear(envelope, timeBase.nSamples);
}

/**
 * Square activation: `intensity` for the first dutyCycle of each cycle,
 * `restIntensity` for the rest
 */
export function repetitiveEnvelope(timeBase: TimeBase, settings: RepetitiveSettings): number[] {
  return timeBase.time.map(t => {
    const phase = settings.frequency * t - Math.floor(settings.frequency * t);
    return phase < settings.dutyCycle ? settings.intensity : settings.restIntensity;
  });
}

type SegmentBuilder = (timeBase: TimeBase, intensity: number, context: FiringContext) => number[];

/**
 * Renderers for the movement types a complex pattern can chain
 */
export const SEGMENT_BUILDERS: Record<EmgMovementType, SegmentBuilder> = {
  isometric: (timeBase, intensity, context) =>
    fireMotorUnits(timeBase, constantEnvelope(timeBase, intensity), context),
  dynamic: (timeBase, intensity, context) =>
    fireMotorUnits(timeBase, rampEnvelope(timeBase, 'ramp', intensity), context),
  repetitive: (timeBase, intensity, context) =>
    fireMotorUnits(
      timeBase,
      repetitiveEnvelope(timeBase, { ...EMG_DEFAULTS.repetitive, intensity }),
      context
    ),
};
