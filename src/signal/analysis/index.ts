/**
 * Analysis helpers
 * @module signal/analysis
 */

export { detectRPeaks, beatIntervals, heartRateFromPeaks } from './peaks';
export type { PeakDetectionOptions, RPeak } from './peaks';
export { powerSpectrum, spectralSlope } from './spectrum';
export type { PowerSpectrum, SlopeOptions } from './spectrum';
