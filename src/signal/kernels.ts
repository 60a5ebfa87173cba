/**
 * Analytic waveform kernels
 *
 * Each kernel is a short pulse sampled on an inclusive grid of
 * round(duration * samplingRate) points. Kernels are pure and rebuilt on
 * every call.
 *
 * @module signal/kernels
 */

import { EMG_DEFAULTS } from '../config/defaults';
import { cumulativeSum, hanning, linspace } from '../utils/math';

function sampleCount(duration: number, samplingRate: number): number {
  return Math.max(Math.round(duration * samplingRate), 0);
}

/**
 * Motor unit action potential: -t * exp(-2000 t^2) over [-2 ms, 2 ms]
 */
export function muap(samplingRate: number): number[] {
  const half = EMG_DEFAULTS.muapDuration / 2;
  const t = linspace(-half, half, sampleCount(EMG_DEFAULTS.muapDuration, samplingRate));
  return t.map(x => -x * Math.exp(-2000 * x * x));
}

/**
 * a * exp(-100 t^2) over [-d/2, d/2]
 */
export function gaussianBump(amplitude: number, duration: number, samplingRate: number): number[] {
  const t = linspace(-duration / 2, duration / 2, sampleCount(duration, samplingRate));
  return t.map(x => amplitude * Math.exp(-100 * x * x));
}

export interface QrsShapeSpec {
  qAmp: number;
  rAmp: number;
  sAmp: number;
  duration: number;
}

/**
 * Three Gaussian lobes at -d/4, 0 and +d/4
 *
 * Time is normalised by the duration, so the lobes keep their relative
 * spacing for narrow and wide complexes alike.
 */
export function qrsComplex(shape: QrsShapeSpec, samplingRate: number): number[] {
  const { qAmp, rAmp, sAmp, duration } = shape;
  const lobe = (x: number, center: number): number => {
    const u = (x - center) / duration;
    return Math.exp(-50 * u * u);
  };

  const t = linspace(-duration / 2, duration / 2, sampleCount(duration, samplingRate));
  return t.map(
    x => qAmp * lobe(x, -duration / 4) + rAmp * lobe(x, 0) + sAmp * lobe(x, duration / 4)
  );
}

/**
 * Asymmetric saccade velocity: vp * exp(-(t - d/3)^2 / (0.2 d)^2) on [0, d]
 */
export function saccadeVelocity(duration: number, peakVelocity: number, samplingRate: number): number[] {
  const t = linspace(0, duration, Math.max(sampleCount(duration, samplingRate), 1));
  const width = 0.2 * duration;
  return t.map(x => peakVelocity * Math.exp(-((x - duration / 3) ** 2) / (width * width)));
}

/**
 * Integrated saccade trace ending exactly at `amplitude`
 */
export function saccadePosition(
  amplitude: number,
  duration: number,
  peakVelocity: number,
  samplingRate: number
): number[] {
  const position = cumulativeSum(saccadeVelocity(duration, peakVelocity, samplingRate)).map(
    v => v / samplingRate
  );
  const final = position[position.length - 1];
  if (final === 0) return position.map(() => 0);
  return position.map(v => (amplitude * v) / final);
}

/**
 * Constant pulse of round(d * fs) samples
 */
export function rectangularPulse(amplitude: number, duration: number, samplingRate: number): number[] {
  return new Array<number>(sampleCount(duration, samplingRate)).fill(amplitude);
}

/**
 * Straight line from `from` to `to`, both ends included
 */
export function linearRamp(from: number, to: number, duration: number, samplingRate: number): number[] {
  return linspace(from, to, sampleCount(duration, samplingRate));
}

/**
 * a * exp(-x) with x running from 0 to 5 across the pulse
 */
export function exponentialDecay(amplitude: number, duration: number, samplingRate: number): number[] {
  return linspace(0, 5, sampleCount(duration, samplingRate)).map(x => amplitude * Math.exp(-x));
}

/**
 * Hann window spanning `duration`
 */
export function hanningWindow(duration: number, samplingRate: number): number[] {
  return hanning(sampleCount(duration, samplingRate));
}
