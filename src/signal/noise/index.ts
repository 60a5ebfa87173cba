/**
 * Noise and artifact exports
 * @module signal/noise
 */

export { NoiseSynthesizer } from './noise-synthesizer';
export { ALL_NOISE_STRATEGIES, runNoiseStrategy } from './strategies';
export { coloredNoise } from './spectra';
export type { NoiseContext, NoiseStrategy } from './bursts';
