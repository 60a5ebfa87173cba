/**
 * fft.js wrappers
 *
 * fft.js works on interleaved complex arrays of a power-of-two size; these
 * helpers do the padding and unpacking.
 *
 * @module signal/fft
 */

import FFT from 'fft.js';
import { nextPowerOfTwo } from '../utils/math';

/**
 * Bin frequencies in cycles per sample, in FFT order
 * (0, 1/N, ..., then the negative half)
 */
export function fftFrequencies(size: number): number[] {
  const frequencies = new Array<number>(size);
  for (let k = 0; k < size; k++) {
    frequencies[k] = (k < size / 2 ? k : k - size) / size;
  }
  return frequencies;
}

/**
 * Real part of the inverse transform of an interleaved spectrum,
 * normalised by 1 / N
 */
export function inverseReal(spectrum: readonly number[]): number[] {
  const size = spectrum.length / 2;
  const fft = new FFT(size);
  const out = fft.createComplexArray();
  fft.inverseTransform(out, spectrum);

  const real = new Array<number>(size);
  for (let i = 0; i < size; i++) {
    real[i] = out[2 * i];
  }
  return real;
}

/**
 * Full interleaved spectrum of a real signal, zero-padded to a power of two
 */
export function forwardReal(signal: readonly number[]): { spectrum: number[]; size: number } {
  const size = nextPowerOfTwo(signal.length);
  const frame = new Array<number>(size).fill(0);
  for (let i = 0; i < signal.length; i++) {
    frame[i] = signal[i];
  }

  const fft = new FFT(size);
  const spectrum = fft.createComplexArray();
  fft.realTransform(spectrum, frame);
  fft.completeSpectrum(spectrum);
  return { spectrum, size };
}
