/**
 * Saccades
 *
 * Durations and peak velocities follow the main sequence unless given.
 * Saccades are placed one after another with a 50 ms gap; each one moves
 * gaze by its amplitude and the new position is held until the next.
 *
 * @module signal/eog/saccades
 */

import { EOG_DEFAULTS, MAIN_SEQUENCE } from '../../config/defaults';
import { GAZE_DIRECTIONS } from '../../types';
import type { GazeDirection, SaccadeParams, TimeBase } from '../../types';
import {
  InvalidParameterError,
  requireFinite,
  requireOneOf,
  requirePositive,
} from '../../utils/validation';
import { saccadePosition } from '../kernels';
import { addConstant, type PlacementTally } from '../placement';
import type { Random } from '../random';

export interface EogContext {
  timeBase: TimeBase;
  random: Random;
  tally: PlacementTally;
}

export interface Saccade {
  /** Degrees, signed */
  amplitude: number;
  direction: GazeDirection;
  /** Seconds */
  duration: number;
  /** deg/s */
  peakVelocity: number;
}

export function mainSequenceDuration(amplitude: number): number {
  return MAIN_SEQUENCE.durationBase + MAIN_SEQUENCE.durationSlope * Math.abs(amplitude);
}

export function mainSequenceVelocity(amplitude: number): number {
  return MAIN_SEQUENCE.velocityBase + MAIN_SEQUENCE.velocitySlope * Math.abs(amplitude);
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function expand<T>(value: T | readonly T[] | undefined, count: number, field: string): (T | undefined)[] {
  if (value === undefined) return new Array<T | undefined>(count).fill(undefined);
  if (!isList(value)) return new Array<T | undefined>(count).fill(value);
  if (value.length !== count) {
    throw new InvalidParameterError(`has ${value.length} entries but amplitudes has ${count}`, field, value);
  }
  return [...value];
}

/**
 * Expand scalars, check list lengths and fill in the main sequence
 */
export function resolveSaccades(params: SaccadeParams): Saccade[] {
  const amplitudes: readonly number[] =
    typeof params.amplitudes === 'number' ? [params.amplitudes] : params.amplitudes;
  const count = amplitudes.length;
  const directions = expand<GazeDirection>(params.directions, count, 'directions');
  const durations = expand<number>(params.durations, count, 'durations');
  const velocities = expand<number>(params.peakVelocities, count, 'peakVelocities');

  return amplitudes.map((raw, i) => {
    const amplitude = requireFinite(raw, `amplitudes[${i}]`);
    return {
      amplitude,
      direction: requireOneOf(directions[i] ?? 'horizontal', `directions[${i}]`, GAZE_DIRECTIONS),
      duration: requirePositive(durations[i] ?? mainSequenceDuration(amplitude), `durations[${i}]`),
      peakVelocity: requirePositive(velocities[i] ?? mainSequenceVelocity(amplitude), `peakVelocities[${i}]`),
    };
  });
}

/**
 * Add one saccade at `startIndex` and hold its end position
 *
 * @returns Whether the saccade was placed
 */
export function placeSaccade(
  buffer: number[],
  saccade: Saccade,
  startIndex: number,
  context: EogContext
): boolean {
  const { samplingRate } = context.timeBase;
  const trace = saccadePosition(saccade.amplitude, saccade.duration, saccade.peakVelocity, samplingRate);
  const written = context.tally.place(buffer, trace, startIndex);
  if (written === 0) return false;

  addConstant(buffer, saccade.amplitude, startIndex + trace.length);
  return true;
}

/**
 * Sequence of saccades from t = 0
 */
export function renderSaccades(saccades: readonly Saccade[], context: EogContext): number[] {
  const { samplingRate, nSamples } = context.timeBase;
  const signal = new Array<number>(nSamples).fill(0);

  let cursor = 0;
  for (const saccade of saccades) {
    placeSaccade(signal, saccade, Math.round(cursor * samplingRate), context);
    cursor += saccade.duration + EOG_DEFAULTS.saccadeGap;
  }
  return signal;
}
