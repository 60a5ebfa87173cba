/**
 * Event schedules
 *
 * A schedule is an ascending list of start times in seconds, every entry
 * inside [0, (nSamples - 1) / samplingRate].
 *
 * @module signal/schedule
 */

import type { TimeBase } from '../types';
import { clamp } from '../utils/math';
import type { Random } from './random';

/**
 * Last time that still maps to a sample
 */
export function lastSampleTime(timeBase: TimeBase): number {
  return (timeBase.nSamples - 1) / timeBase.samplingRate;
}

/**
 * Clamp every time into the buffer and sort ascending
 */
export function normalizeSchedule(times: readonly number[], timeBase: TimeBase): number[] {
  const limit = lastSampleTime(timeBase);
  return times.map(t => clamp(t, 0, limit)).sort((a, b) => a - b);
}

/**
 * floor(D * rate / 60) events at i * 60 / rate, each jittered by N(0, jitterStd)
 *
 * @param ratePerMinute - Events per minute (bpm for beats)
 * @param jitterStd - Seconds
 * @param offset - Seconds added to every event
 */
export function regularSchedule(
  timeBase: TimeBase,
  ratePerMinute: number,
  jitterStd: number,
  random: Random,
  offset: number = 0
): number[] {
  const interval = 60 / ratePerMinute;
  const count = Math.floor(timeBase.duration / interval);
  const times: number[] = [];
  for (let i = 0; i < count; i++) {
    const jitter = jitterStd > 0 ? random.normal(0, jitterStd) : 0;
    times.push(offset + i * interval + jitter);
  }
  return normalizeSchedule(times, timeBase);
}

/**
 * Events separated by intervals drawn from U(minInterval, maxInterval),
 * starting at `start` and running until the end of the time base
 */
export function irregularSchedule(
  timeBase: TimeBase,
  minInterval: number,
  maxInterval: number,
  random: Random,
  start: number = 0
): number[] {
  const times: number[] = [];
  for (let t = start; t < timeBase.duration; t += random.uniform(minInterval, maxInterval)) {
    times.push(t);
  }
  return normalizeSchedule(times, timeBase);
}
