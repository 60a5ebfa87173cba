/**
 * Default configuration values
 * @module config/defaults
 */

import type { BoundaryPolicy, SignalFamily } from '../types';

/**
 * Default waveform morphology for a normal beat (mV, seconds)
 */
export const ECG_WAVE_DEFAULTS = {
  pWave: { amplitude: 0.2, duration: 0.1 },
  qrs: { qAmp: -0.5, rAmp: 1.0, sAmp: -0.2, duration: 0.1 },
  tWave: { amplitude: 0.3, duration: 0.14 },
} as const;

/**
 * Beat timing, relative to the P onset
 */
export const ECG_TIMING = {
  /** P onset to QRS onset */
  prInterval: 0.16,
  /** Minimum QRS onset to T onset */
  minQtGap: 0.2,
  /** Gap between QRS end and T onset when the QRS is wide */
  stSegment: 0.05,
} as const;

export const ECG_DEFAULTS = {
  heartRate: 75,
  severity: 0.5,
  hrvStd: 0,
} as const;

/**
 * Arrhythmia defaults
 */
export const ARRHYTHMIA_DEFAULTS = {
  pvcFrequency: 0.2,
  /** QRS gain of an ectopic ventricular beat */
  pvcScale: 2.5,
  /** Ventricular response range during AF, bpm (validated like heartRate, so at most 400) */
  afRate: [70, 150],
  bradyRate: 45,
  tachyRate: 120,
  heartBlockDegree: 1,
  prProlongation: 0.14,
  escapeRate: 40,
  /** First escape beat lands in this window, seconds */
  escapeOnset: [0.2, 0.4],
} as const;

/**
 * Ischemic overlays, scaled by severity
 */
export const ISCHEMIA_DEFAULTS = {
  stElevation: 0.3,
  stDepression: -0.2,
  stDuration: 0.1,
  qWaveDepth: -0.4,
  qWaveDuration: 0.04,
} as const;

/**
 * Conduction abnormality morphology
 */
export const CONDUCTION_DEFAULTS = {
  bundleBranchQrs: { base: 0.12, perSeverity: 0.08 },
  lbbbLobes: [0.8, 1.0, 0.8],
  rbbbLobes: [-0.5, 1.0, 0.7],
  lafbQrs: { base: 0.08, perSeverity: 0.04 },
  lafbLobes: [-0.2, 1.5, -0.3],
  wpwPrInterval: 0.08,
  deltaWave: { amplitude: 0.3, duration: 0.04 },
} as const;

/**
 * EMG firing model
 */
export const EMG_DEFAULTS = {
  /** Firing rate (Hz) = baseRate + rateGain * intensity */
  baseRate: 50,
  rateGain: 450,
  /** MUAP gain = amplitudeBase + amplitudeGain * intensity */
  amplitudeBase: 0.7,
  amplitudeGain: 0.3,
  amplitudeJitter: [0.9, 1.1],
  muapDuration: 0.004,
  intensity: 0.5,
  fatigueRate: 2,
  dynamic: { maxIntensity: 0.8, frequency: 1 },
  repetitive: { frequency: 1, dutyCycle: 0.5, intensity: 0.7, restIntensity: 0.1 },
} as const;

/**
 * Saccade main sequence: duration = base + slope * |A|, vp = base + slope * |A|
 */
export const MAIN_SEQUENCE = {
  durationBase: 0.02,
  durationSlope: 0.002,
  velocityBase: 200,
  velocitySlope: 20,
} as const;

export const EOG_DEFAULTS = {
  amplitude: 10,
  frequency: 0.5,
  nSaccades: 5,
  saccadeGap: 0.05,
  catchUpFraction: 0.1,
  catchUpDuration: 0.02,
} as const;

export const FIXATION_DEFAULTS = {
  microsaccadeRate: 2,
  microsaccadeAmplitude: 0.2,
  microsaccadeDuration: 0.02,
  driftAmplitude: 0.5,
  tremorAmplitude: 0.1,
  tremorFrequency: 80,
} as const;

export const BLINK_DEFAULTS = {
  nBlinks: 3,
  blinkDuration: 0.2,
  amplitudeRange: [0.8, 1.2],
  minInterval: 0.5,
  naturalVariability: true,
  durationJitter: [0.8, 1.2],
  partialProbability: 0.2,
  partialScale: [0.3, 0.7],
} as const;

/**
 * Noise and artifact defaults
 */
export const NOISE_DEFAULTS = {
  std: 1,
  amplitude: 1,
  powerlineFrequency: 50,
  harmonics: 2,
  driftFrequency: 0.5,
  minFreq: 100,
  maxFreq: 500,
  nComponents: 10,
} as const;

/**
 * Defaults used by `addNoise` on an existing signal
 */
export const OVERLAY_DEFAULTS = {
  std: 0.1,
  amplitude: 0.1,
} as const;

/**
 * Burst count and length per artifact type
 */
export const BURST_DEFAULTS = {
  electrode_movement: { count: 3, duration: 0.2 },
  cable_motion: { count: 3, duration: 0.2 },
  subject_movement: { count: 3, duration: 0.2 },
  baseline_shift: { count: 3, duration: 0.2 },
  emg: { count: 5, duration: 0.2 },
  poor_contact: { count: 3, duration: 0.2 },
  electrode_pop: { count: 2, duration: 0.05 },
  impedance_change: { count: 2, duration: 0.5 },
} as const;

export const INTERFERENCE_DEFAULTS = {
  heartRate: 60,
  switchingFreq: 1000,
  dutyCycle: 0.1,
  nSpikes: 20,
  emgTones: 10,
  emgBand: [20, 500],
  environmentalHarmonics: 3,
  environmentalTones: 5,
  environmentalBand: [100, 1000],
  dcDriftFrequency: 0.1,
  dcSteps: 3,
} as const;

/**
 * What each family does with kernels that cross the buffer edge
 */
export const BOUNDARY_POLICIES: Readonly<Record<SignalFamily, BoundaryPolicy>> = {
  ecg: 'skip',
  eog: 'skip',
  emg: 'clip',
  noise: 'clip',
};

/**
 * Accepted parameter ranges (inclusive)
 */
export const PARAMETER_RANGES = {
  heartRate: { min: 20, max: 400 },
  intensity: { min: 0, max: 1 },
  severity: { min: 0, max: 1 },
  probability: { min: 0, max: 1 },
  dutyCycle: { min: 0, max: 1 },
} as const;
