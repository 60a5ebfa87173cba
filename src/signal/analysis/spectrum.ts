/**
 * Periodogram and spectral slope
 *
 * @module signal/analysis/spectrum
 */

import { linearRegressionSlope } from '../../utils/math';
import { InvalidParameterError, requirePositive } from '../../utils/validation';
import { forwardReal } from '../fft';

export interface PowerSpectrum {
  /** Hz, 0 to Nyquist */
  frequencies: number[];
  power: number[];
}

/**
 * One-sided periodogram |X(k)|^2 / (fs * N), zero-padded to a power of two
 */
export function powerSpectrum(signal: readonly number[], samplingRate: number): PowerSpectrum {
  requirePositive(samplingRate, 'samplingRate');
  if (signal.length === 0) {
    throw new InvalidParameterError('cannot be empty', 'signal', signal.length);
  }

  const { spectrum, size } = forwardReal(signal);
  const bins = size / 2 + 1;
  const frequencies = new Array<number>(bins);
  const power = new Array<number>(bins);
  for (let k = 0; k < bins; k++) {
    const re = spectrum[2 * k];
    const im = spectrum[2 * k + 1];
    frequencies[k] = (k * samplingRate) / size;
    power[k] = (re * re + im * im) / (samplingRate * size);
  }
  return { frequencies, power };
}

export interface SlopeOptions {
  /** Hz, default the first non-zero bin */
  minFrequency?: number;
  /** Hz, default Nyquist */
  maxFrequency?: number;
}

/**
 * Least-squares slope of log10 power against log10 frequency
 *
 * About -1 for pink noise, -2 for brown and 0 for white.
 */
export function spectralSlope(signal: readonly number[], samplingRate: number, options: SlopeOptions = {}): number {
  const { frequencies, power } = powerSpectrum(signal, samplingRate);
  const low = options.minFrequency ?? 0;
  const high = options.maxFrequency ?? samplingRate / 2;

  const x: number[] = [];
  const y: number[] = [];
  frequencies.forEach((f, k) => {
    if (f > 0 && f >= low && f <= high && power[k] > 0) {
      x.push(Math.log10(f));
      y.push(Math.log10(power[k]));
    }
  });
  if (x.length < 2) {
    throw new InvalidParameterError('band holds fewer than two bins', 'frequencyRange', [low, high]);
  }
  return linearRegressionSlope(x, y);
}
