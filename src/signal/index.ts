/**
 * Signal synthesis exports
 * @module signal
 */

// Grid, randomness and placement
export { makeTimeBase, secondsToSamples, zeros } from './time-base';
export { Random, sharedRandom } from './random';
export { placeKernel, addConstant, PlacementTally, type PlacementOptions } from './placement';
export { regularSchedule, irregularSchedule, normalizeSchedule, lastSampleTime } from './schedule';
export { fftFrequencies, forwardReal, inverseReal } from './fft';

// Waveform kernels
export {
  muap,
  gaussianBump,
  qrsComplex,
  saccadeVelocity,
  saccadePosition,
  rectangularPulse,
  linearRamp,
  exponentialDecay,
  hanningWindow,
  type QrsShapeSpec,
} from './kernels';

// Synthesizers
export { Synthesizer, type SynthesizerOptions } from './synthesizer';
export * from './noise';
export * from './emg';
export * from './ecg';
export * from './eog';

// Facade
export {
  BiosignalSimulator,
  createSynthesizer,
  type ArtifactSpec,
  type CompositionRequest,
  type FamilyParams,
  type FamilySynthesizers,
  type NoiseLayer,
} from './simulator';

// Analysis
export * from './analysis';
