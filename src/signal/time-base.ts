/**
 * Sampling grid
 * @module signal/time-base
 */

import type { TimeBase } from '../types';
import { InvalidParameterError, requirePositive } from '../utils/validation';

/**
 * Build a frozen time base of round(samplingRate * duration) samples
 *
 * @param samplingRate - Hz
 * @param duration - Seconds
 */
export function makeTimeBase(samplingRate: number, duration: number): TimeBase {
  requirePositive(samplingRate, 'samplingRate');
  requirePositive(duration, 'duration');

  const nSamples = Math.round(samplingRate * duration);
  if (nSamples < 1) {
    throw new InvalidParameterError(
      `${duration} s at ${samplingRate} Hz yields no samples`,
      'duration',
      duration
    );
  }

  const time = new Array<number>(nSamples);
  for (let i = 0; i < nSamples; i++) {
    time[i] = i / samplingRate;
  }

  return Object.freeze({
    samplingRate,
    duration,
    nSamples,
    time: Object.freeze(time),
  });
}

/**
 * Nearest sample index for a time in seconds
 */
export function secondsToSamples(seconds: number, samplingRate: number): number {
  return Math.round(seconds * samplingRate);
}

/**
 * Zero-filled buffer matching a time base
 */
export function zeros(length: number): number[] {
  return new Array<number>(length).fill(0);
}
