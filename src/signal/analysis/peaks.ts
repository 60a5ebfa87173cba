/**
 * R-peak detection for labelling synthetic ECG
 *
 * Works on clean or lightly perturbed synthetic traces: local maxima above a
 * fraction of the largest sample, with a refractory period between beats.
 *
 * @module signal/analysis/peaks
 */

import { maxAbs } from '../../utils/math';
import { requirePositive, requireUnitInterval } from '../../utils/validation';

export interface PeakDetectionOptions {
  /** Fraction of the largest absolute sample a peak must exceed (default 0.5) */
  threshold?: number;
  /** Minimum seconds between peaks (default 0.25, i.e. 240 bpm) */
  refractory?: number;
}

export interface RPeak {
  index: number;
  amplitude: number;
}

/**
 * Detect R peaks
 *
 * @returns Peaks in ascending sample order
 */
export function detectRPeaks(
  signal: readonly number[],
  samplingRate: number,
  options: PeakDetectionOptions = {}
): RPeak[] {
  requirePositive(samplingRate, 'samplingRate');
  const threshold = requireUnitInterval(options.threshold ?? 0.5, 'threshold') * maxAbs(signal);
  const minDistance = Math.max(Math.round(requirePositive(options.refractory ?? 0.25, 'refractory') * samplingRate), 1);

  const peaks: RPeak[] = [];
  for (let i = 1; i < signal.length - 1; i++) {
    const value = signal[i];
    if (value <= threshold || value <= signal[i - 1] || value < signal[i + 1]) continue;

    const last = peaks[peaks.length - 1];
    if (last === undefined || i - last.index >= minDistance) {
      peaks.push({ index: i, amplitude: value });
    } else if (value > last.amplitude) {
      // Keep the taller of two peaks inside the refractory period
      peaks[peaks.length - 1] = { index: i, amplitude: value };
    }
  }
  return peaks;
}

/**
 * Seconds between consecutive peaks
 */
export function beatIntervals(peaks: readonly RPeak[], samplingRate: number): number[] {
  const intervals: number[] = [];
  for (let i = 1; i < peaks.length; i++) {
    intervals.push((peaks[i].index - peaks[i - 1].index) / samplingRate);
  }
  return intervals;
}

/**
 * Heart rate from the median interval, in bpm (0 with fewer than two peaks)
 */
export function heartRateFromPeaks(peaks: readonly RPeak[], samplingRate: number): number {
  const intervals = beatIntervals(peaks, samplingRate).sort((a, b) => a - b);
  if (intervals.length === 0) return 0;
  return 60 / intervals[Math.floor(intervals.length / 2)];
}
