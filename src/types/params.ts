/**
 * Generation parameter types for every signal family
 *
 * Variant names are kept as string unions backed by `as const` arrays; the
 * arrays drive runtime validation and the lookup tables the synthesizers
 * dispatch through.
 *
 * @module types/params
 */

import type { BoundaryPolicy } from './signal';

/**
 * Options accepted by every `generate` call
 */
export interface GenerationOptions {
  /** Reseeds the synthesizer's generator right before generation */
  randomSeed?: number;
}

// ============================================================================
// Noise and artifacts
// ============================================================================

export const NOISE_TYPES = [
  'gaussian',
  'pink',
  'brown',
  'powerline',
  'baseline_wander',
  'high_frequency',
] as const;
export type NoiseType = (typeof NOISE_TYPES)[number];

export const MOTION_ARTIFACT_TYPES = [
  'electrode_movement',
  'cable_motion',
  'subject_movement',
  'baseline_shift',
] as const;
export type MotionArtifactType = (typeof MOTION_ARTIFACT_TYPES)[number];

export const INTERFERENCE_TYPES = ['emg', 'ecg', 'environmental', 'device'] as const;
export type InterferenceType = (typeof INTERFERENCE_TYPES)[number];

export const ELECTRODE_ARTIFACT_TYPES = [
  'poor_contact',
  'electrode_pop',
  'impedance_change',
  'dc_offset',
] as const;
export type ElectrodeArtifactType = (typeof ELECTRODE_ARTIFACT_TYPES)[number];

/**
 * Every type string the noise synthesizer accepts
 */
export type AnyNoiseType = NoiseType | MotionArtifactType | InterferenceType | ElectrodeArtifactType;

export const ALL_NOISE_TYPES: readonly AnyNoiseType[] = [
  ...NOISE_TYPES,
  ...MOTION_ARTIFACT_TYPES,
  ...INTERFERENCE_TYPES,
  ...ELECTRODE_ARTIFACT_TYPES,
] as const;

/**
 * Flat set of noise knobs; each type reads the ones it needs
 */
export interface NoiseParams {
  /** Standard deviation (gaussian) */
  std?: number;
  amplitude?: number;
  /** Hz: mains frequency (powerline, environmental) */
  frequency?: number;
  harmonics?: number;
  /** Hz (baseline_wander, dc_offset) */
  driftFrequency?: number;
  /** Hz (high_frequency) */
  minFreq?: number;
  /** Hz (high_frequency) */
  maxFreq?: number;
  nComponents?: number;

  /** Number of bursts for any burst artifact */
  nEvents?: number;
  /** Alias of nEvents for motion artifacts */
  nArtifacts?: number;
  /** Alias of nEvents for EMG crosstalk */
  nBursts?: number;
  /** Burst length in seconds */
  duration?: number;
  /** bpm (ecg interference) */
  heartRate?: number;
  /** Hz (device interference) */
  switchingFreq?: number;
  /** Fraction of the switching period spent high (device interference) */
  dutyCycle?: number;
  nSpikes?: number;
}

export interface NoiseGenerateParams extends NoiseParams, GenerationOptions {
  noiseType?: AnyNoiseType;
}

/**
 * Single artifacts added by `addArtifact`
 */
export const ARTIFACT_TYPES = ['spike', 'step', 'ramp', 'exponential_decay'] as const;
export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

// ============================================================================
// EMG
// ============================================================================

export const EMG_PATTERN_TYPES = ['isometric', 'dynamic', 'repetitive', 'complex'] as const;
export type EmgPatternType = (typeof EMG_PATTERN_TYPES)[number];

export const EMG_RAMP_TYPES = ['ramp', 'sine'] as const;
export type EmgRampType = (typeof EMG_RAMP_TYPES)[number];

export const EMG_MOVEMENT_TYPES = ['isometric', 'dynamic', 'repetitive'] as const;
export type EmgMovementType = (typeof EMG_MOVEMENT_TYPES)[number];

interface EmgCommonParams extends GenerationOptions {
  /** Decay constant of the exp(-rate * t / d) fatigue envelope */
  fatigueRate?: number;
  /** Shorthand for fatigueRate = 2 */
  fatigue?: boolean;
  boundaryPolicy?: BoundaryPolicy;
}

export interface IsometricParams extends EmgCommonParams {
  patternType?: 'isometric';
  /** Normalised activation 0-1 */
  intensity?: number;
  /** Alias of intensity */
  activationLevel?: number;
  /** Active segment length in seconds, from t = 0 */
  duration?: number;
}

export interface DynamicParams extends EmgCommonParams {
  patternType: 'dynamic';
  rampType?: EmgRampType;
  /** Custom activation envelope, resampled to the signal length */
  envelope?: readonly number[];
  maxIntensity?: number;
  /** Hz, sine envelope only */
  frequency?: number;
}

export interface RepetitiveParams extends EmgCommonParams {
  patternType: 'repetitive';
  /** Cycles per second */
  frequency?: number;
  /** Fraction of each cycle spent contracting */
  dutyCycle?: number;
  intensity?: number;
  restIntensity?: number;
}

export interface MovementSegment {
  type: EmgMovementType;
  /** Seconds */
  duration: number;
  intensity: number;
}

export interface ComplexParams extends EmgCommonParams {
  patternType: 'complex';
  movements: readonly MovementSegment[];
  /** Superpose segments from t = 0 instead of concatenating them */
  overlap?: boolean;
}

export type EmgParams = IsometricParams | DynamicParams | RepetitiveParams | ComplexParams;

// ============================================================================
// ECG
// ============================================================================

export const ARRHYTHMIA_TYPES = ['pvc', 'af', 'brady', 'tachy', 'heart_block'] as const;
export type ArrhythmiaType = (typeof ARRHYTHMIA_TYPES)[number];

export const ISCHEMIA_TYPES = ['st_elevation', 'st_depression', 't_wave_inversion', 'q_wave'] as const;
export type IschemiaType = (typeof ISCHEMIA_TYPES)[number];

export const CONDUCTION_TYPES = ['lbbb', 'rbbb', 'wpw', 'lafb'] as const;
export type ConductionType = (typeof CONDUCTION_TYPES)[number];

export type EcgCondition = 'normal' | ArrhythmiaType | IschemiaType | ConductionType;

export const ECG_CONDITIONS: readonly EcgCondition[] = [
  'normal',
  ...ARRHYTHMIA_TYPES,
  ...ISCHEMIA_TYPES,
  ...CONDUCTION_TYPES,
] as const;

export type HeartBlockDegree = 1 | 2 | 3;

export interface WaveShape {
  amplitude?: number;
  /** Seconds */
  duration?: number;
}

export interface QrsShape {
  qAmp?: number;
  rAmp?: number;
  sAmp?: number;
  /** Seconds */
  duration?: number;
}

export interface EcgParams extends GenerationOptions {
  /** null or undefined selects normal sinus rhythm */
  condition?: EcgCondition | null;
  /** bpm */
  heartRate?: number;
  /** 0-1 */
  severity?: number;
  /** Seconds of N(0, hrvStd) jitter per beat */
  hrvStd?: number;
  /** Probability that a beat is a PVC */
  pvcFrequency?: number;
  /** Ventricular response range [min, max] in bpm during AF; both ends must lie in the 20-400 bpm heart-rate range */
  afRate?: readonly [number, number];
  heartBlockDegree?: HeartBlockDegree;
  /** Seconds added to the PR interval in first-degree block */
  prProlongation?: number;
  /** bpm of the ventricular escape rhythm in third-degree block */
  escapeRate?: number;
  pWave?: WaveShape;
  qrs?: QrsShape;
  tWave?: WaveShape;
  boundaryPolicy?: BoundaryPolicy;
}

// ============================================================================
// EOG
// ============================================================================

export const EOG_MOVEMENT_TYPES = ['saccades', 'pursuit', 'fixation'] as const;
export type EogMovementType = (typeof EOG_MOVEMENT_TYPES)[number];

export const GAZE_DIRECTIONS = ['horizontal', 'vertical'] as const;
export type GazeDirection = (typeof GAZE_DIRECTIONS)[number];

export const PURSUIT_PATTERNS = ['linear', 'sinusoidal', 'circular', 'custom'] as const;
export type PursuitPattern = (typeof PURSUIT_PATTERNS)[number];

export interface SaccadeParams {
  /** Degrees; sign gives the direction (positive = right / up) */
  amplitudes: number | readonly number[];
  /**
   * Labels each saccade; validated but not applied to the trace, which is a
   * single channel whose sign carries the direction
   */
  directions?: GazeDirection | readonly GazeDirection[];
  /** Seconds; main sequence when omitted */
  durations?: number | readonly number[];
  /** deg/s; main sequence when omitted */
  peakVelocities?: number | readonly number[];
  boundaryPolicy?: BoundaryPolicy;
}

export interface PursuitParams {
  pattern?: PursuitPattern;
  /** Degrees */
  amplitude?: number;
  /** Hz */
  frequency?: number;
  direction?: GazeDirection;
  customTrajectory?: readonly number[];
  boundaryPolicy?: BoundaryPolicy;
}

export interface FixationParams {
  /** Mean microsaccades per second */
  microsaccadeRate?: number;
  microsaccadeAmplitude?: number;
  driftAmplitude?: number;
  tremorAmplitude?: number;
  /** Hz */
  tremorFrequency?: number;
  boundaryPolicy?: BoundaryPolicy;
}

export interface BlinkParams {
  nBlinks?: number;
  /** Seconds */
  blinkDuration?: number;
  amplitudeRange?: readonly [number, number];
  /** Seconds between blink starts */
  minInterval?: number;
  naturalVariability?: boolean;
  boundaryPolicy?: BoundaryPolicy;
}

export interface EogParams extends GenerationOptions, FixationParams, BlinkParams {
  movementType?: EogMovementType;
  /** Saccade direction or pursuit pattern, depending on movementType */
  pattern?: GazeDirection | PursuitPattern;
  amplitude?: number;
  frequency?: number;
  /** Random saccades drawn when amplitudes is absent */
  nSaccades?: number;
  amplitudes?: SaccadeParams['amplitudes'];
  directions?: SaccadeParams['directions'];
  durations?: SaccadeParams['durations'];
  peakVelocities?: SaccadeParams['peakVelocities'];
  direction?: GazeDirection;
  customTrajectory?: readonly number[];
  addBlinks?: boolean;
  boundaryPolicy?: BoundaryPolicy;
}
