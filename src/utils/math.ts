/**
 * Mathematical utilities
 * @module utils/math
 */

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * `count` evenly spaced values from start to stop, both ends included
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];

  const step = (stop - start) / (count - 1);
  const values = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    values[i] = start + i * step;
  }
  return values;
}

/**
 * Running sum
 */
export function cumulativeSum(values: readonly number[]): number[] {
  const result = new Array<number>(values.length);
  let total = 0;
  for (let i = 0; i < values.length; i++) {
    total += values[i];
    result[i] = total;
  }
  return result;
}

/**
 * Calculate mean of an array
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return 0;

  const avg = mean(values);
  const squareDiffs = values.map(value => Math.pow(value - avg, 2));
  return Math.sqrt(mean(squareDiffs));
}

/**
 * Largest absolute value (0 for an empty array)
 */
export function maxAbs(values: readonly number[]): number {
  let peak = 0;
  for (const v of values) {
    const magnitude = Math.abs(v);
    if (magnitude > peak) peak = magnitude;
  }
  return peak;
}

/**
 * Symmetric Hann window of `count` points (zero at both ends)
 */
export function hanning(count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [1];
  const window = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    window[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / (count - 1));
  }
  return window;
}

/**
 * Linear resampling of `values` to `count` points spanning the same range
 */
export function resampleLinear(values: readonly number[], count: number): number[] {
  if (count <= 0) return [];
  if (values.length === 0) return new Array<number>(count).fill(0);
  if (values.length === 1) return new Array<number>(count).fill(values[0]);

  const result = new Array<number>(count);
  const last = values.length - 1;
  for (let i = 0; i < count; i++) {
    const position = count === 1 ? 0 : (i * last) / (count - 1);
    const left = Math.min(Math.floor(position), last - 1);
    const alpha = position - left;
    result[i] = values[left] * (1 - alpha) + values[left + 1] * alpha;
  }
  return result;
}

/**
 * Smallest power of two >= n (at least 2, the smallest FFT size)
 */
export function nextPowerOfTwo(n: number): number {
  let size = 2;
  while (size < n) size *= 2;
  return size;
}

/**
 * Least-squares slope of y against x
 */
export function linearRegressionSlope(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length) {
    throw new Error('x and y must have the same length');
  }
  if (x.length < 2) return 0;

  const xMean = mean(x);
  const yMean = mean(y);
  let covariance = 0;
  let varianceX = 0;
  for (let i = 0; i < x.length; i++) {
    covariance += (x[i] - xMean) * (y[i] - yMean);
    varianceX += (x[i] - xMean) * (x[i] - xMean);
  }
  return varianceX === 0 ? 0 : covariance / varianceX;
}
