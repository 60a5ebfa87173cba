/**
 * Blink artifacts
 *
 * Blink times are drawn by spreading the slack left after the minimum
 * intervals, so no two starts are closer than that interval. Each blink is a
 * fast Gaussian closing phase followed by a slower reopening.
 *
 * @module signal/eog/blinks
 */

import { BLINK_DEFAULTS } from '../../config/defaults';
import { linspace } from '../../utils/math';
import { InsufficientDurationError } from '../../utils/validation';
import type { Random } from '../random';
import type { EogContext } from './saccades';

export interface BlinkSettings {
  nBlinks: number;
  blinkDuration: number;
  amplitudeRange: readonly [number, number];
  minInterval: number;
  naturalVariability: boolean;
}

export interface Blink {
  /** Seconds */
  start: number;
  duration: number;
  amplitude: number;
}

/**
 * Closing with time constant d/6, opening with d/3, peak at the midpoint
 */
export function blinkProfile(amplitude: number, duration: number, samplingRate: number): number[] {
  const count = Math.max(Math.round(duration * samplingRate), 0);
  const closing = duration / 6;
  const opening = duration / 3;
  return linspace(-duration / 2, duration / 2, count).map(t =>
    t < 0 ? amplitude * Math.exp(-((t / closing) ** 2)) : amplitude * Math.exp(-((t / opening) ** 2))
  );
}

/**
 * Sorted blink starts in [0, latestStart], pairwise at least `minInterval` apart.
 *
 * Draws `count` offsets uniformly in the slack `latestStart - (count - 1) * minInterval`,
 * sorts them and pushes the i-th one right by `i * minInterval`.
 */
export function scheduleBlinks(
  count: number,
  latestStart: number,
  minInterval: number,
  random: Random
): number[] {
  if (count <= 0) return [];
  const slack = latestStart - (count - 1) * minInterval;
  if (slack < 0) {
    throw new InsufficientDurationError(
      `${count} blinks ${minInterval} s apart need ${(count - 1) * minInterval} s but only ${latestStart} s are available`,
      'nBlinks',
      count
    );
  }
  return Array.from({ length: count }, () => random.uniform(0, slack))
    .sort((a, b) => a - b)
    .map((offset, i) => offset + i * minInterval);
}

function drawBlink(start: number, settings: BlinkSettings, random: Random): Blink {
  const [low, high] = settings.amplitudeRange;
  if (!settings.naturalVariability) {
    return { start, duration: settings.blinkDuration, amplitude: high };
  }

  const [shortest, longest] = BLINK_DEFAULTS.durationJitter;
  const duration = settings.blinkDuration * random.uniform(shortest, longest);
  let amplitude = random.uniform(low, high);
  if (random.chance(BLINK_DEFAULTS.partialProbability)) {
    const [weakest, strongest] = BLINK_DEFAULTS.partialScale;
    amplitude *= random.uniform(weakest, strongest);
  }
  return { start, duration, amplitude };
}

/**
 * Throws when the blinks cannot fit: D - n * d < (n - 1) * minInterval
 */
export function checkBlinkFeasibility(settings: BlinkSettings, totalDuration: number): void {
  const { nBlinks, blinkDuration, minInterval } = settings;
  if (nBlinks === 0) return;
  const free = totalDuration - nBlinks * blinkDuration;
  const needed = (nBlinks - 1) * minInterval;
  if (free < needed) {
    throw new InsufficientDurationError(
      `${nBlinks} blinks of ${blinkDuration} s need ${needed} s of spacing but only ${free} s remain`,
      'nBlinks',
      nBlinks
    );
  }
}

export function renderBlinks(settings: BlinkSettings, context: EogContext): { signal: number[]; blinks: Blink[] } {
  const { timeBase, random, tally } = context;
  checkBlinkFeasibility(settings, timeBase.duration);

  const signal = new Array<number>(timeBase.nSamples).fill(0);
  if (settings.nBlinks === 0) return { signal, blinks: [] };

  const longest = settings.naturalVariability
    ? settings.blinkDuration * BLINK_DEFAULTS.durationJitter[1]
    : settings.blinkDuration;
  const latestStart = Math.max(timeBase.duration - longest, 0);

  const blinks = scheduleBlinks(settings.nBlinks, latestStart, settings.minInterval, random).map(start =>
    drawBlink(start, settings, random)
  );
  for (const blink of blinks) {
    tally.place(
      signal,
      blinkProfile(blink.amplitude, blink.duration, timeBase.samplingRate),
      Math.round(blink.start * timeBase.samplingRate)
    );
  }
  return { signal, blinks };
}
