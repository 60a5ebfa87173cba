/**
 * Core signal data types
 * @module types/signal
 */

/**
 * A generated waveform: one value per sample.
 * Generators always return a fresh array; callers compose by addition.
 */
export type Signal = readonly number[];

/**
 * Sampling grid shared by everything composed into one signal
 */
export interface TimeBase {
  /** Sampling frequency in Hz */
  readonly samplingRate: number;

  /** Duration in seconds */
  readonly duration: number;

  /** round(samplingRate * duration) */
  readonly nSamples: number;

  /** Sample times in seconds, time[i] = i / samplingRate */
  readonly time: Signal;
}

/**
 * Short analytic pulse anchored relative to a beat or event start
 */
export interface WaveformKernel {
  readonly samples: Signal;

  /** Seconds from the event start to the first kernel sample (may be negative) */
  readonly offset: number;
}

/**
 * What to do with a kernel that does not fit entirely inside the buffer
 * - skip: drop it
 * - clip: write the part that overlaps
 */
export type BoundaryPolicy = 'skip' | 'clip';

/**
 * Signal families the engine can synthesize
 */
export type SignalFamily = 'emg' | 'ecg' | 'eog' | 'noise';

export const SIGNAL_FAMILIES: readonly SignalFamily[] = ['emg', 'ecg', 'eog', 'noise'] as const;

/**
 * How a scheduled cardiac beat was rendered
 */
export type BeatKind = 'normal' | 'pvc' | 'fibrillation' | 'escape' | 'blocked';

/**
 * Ground-truth label for one scheduled beat
 */
export interface BeatAnnotation {
  /** Beat start (P onset, or where it would be) in seconds */
  onset: number;

  /** QRS onset in seconds; null when the beat is not conducted or its QRS was not placed */
  qrsOnset: number | null;

  kind: BeatKind;
}

/**
 * Signal together with its beat labels
 */
export interface AnnotatedSignal {
  signal: Signal;
  beats: BeatAnnotation[];
}
