/**
 * Beat morphology and layout
 *
 * A beat is a set of kernels positioned relative to its onset (the P
 * onset). The normal layout puts P at 0, the QRS at the PR interval and the
 * T wave max(0.2, qrsDuration + 0.05) s after the QRS onset.
 *
 * @module signal/ecg/morphology
 */

import { ECG_TIMING } from '../../config/defaults';
import type { BeatKind, WaveformKernel } from '../../types';
import { gaussianBump, qrsComplex, type QrsShapeSpec } from '../kernels';

export interface WaveSpec {
  amplitude: number;
  duration: number;
}

/**
 * Resolved wave shapes for one rendering pass
 */
export interface MorphologySpec {
  pWave: WaveSpec;
  qrs: QrsShapeSpec;
  tWave: WaveSpec;
}

/**
 * Sampled kernels for a normal beat
 */
export interface Morphology {
  spec: MorphologySpec;
  pWave: number[];
  qrs: number[];
  tWave: number[];
}

export interface BeatLayout {
  kernels: WaveformKernel[];
  /** Seconds from onset to QRS onset; null when nothing is conducted. The QRS is the first kernel at this offset */
  qrsOffset: number | null;
  kind: BeatKind;
}

export function buildMorphology(spec: MorphologySpec, samplingRate: number): Morphology {
  return {
    spec,
    pWave: gaussianBump(spec.pWave.amplitude, spec.pWave.duration, samplingRate),
    qrs: qrsComplex(spec.qrs, samplingRate),
    tWave: gaussianBump(spec.tWave.amplitude, spec.tWave.duration, samplingRate),
  };
}

/**
 * QRS onset to T onset
 */
export function qtGap(qrsDuration: number): number {
  return Math.max(ECG_TIMING.minQtGap, qrsDuration + ECG_TIMING.stSegment);
}

export interface ConductedBeatOptions {
  /** P onset to QRS onset, seconds */
  prInterval?: number;
  /** Replacement QRS kernel and its duration */
  qrs?: { samples: number[]; duration: number };
  /** Gain applied to the T wave (negative inverts it) */
  tScale?: number;
  includeP?: boolean;
  /** Additional kernels, offsets relative to the beat onset */
  extras?: WaveformKernel[];
  kind?: BeatKind;
}

/**
 * P, QRS and T laid out for a conducted beat
 */
export function conductedBeat(morphology: Morphology, options: ConductedBeatOptions = {}): BeatLayout {
  const pr = options.prInterval ?? ECG_TIMING.prInterval;
  const qrs = options.qrs ?? { samples: morphology.qrs, duration: morphology.spec.qrs.duration };
  const tScale = options.tScale ?? 1;

  const kernels: WaveformKernel[] = [];
  if (options.includeP ?? true) {
    kernels.push({ samples: morphology.pWave, offset: 0 });
  }
  kernels.push({ samples: qrs.samples, offset: pr });
  kernels.push({
    samples: tScale === 1 ? morphology.tWave : morphology.tWave.map(v => v * tScale),
    offset: pr + qtGap(qrs.duration),
  });
  kernels.push(...(options.extras ?? []));

  return { kernels, qrsOffset: pr, kind: options.kind ?? 'normal' };
}

/**
 * Atrial activity only
 */
export function blockedBeat(morphology: Morphology): BeatLayout {
  return {
    kernels: [{ samples: morphology.pWave, offset: 0 }],
    qrsOffset: null,
    kind: 'blocked',
  };
}

/**
 * Ventricular complex with its T wave and no P, starting at the onset
 */
export function ventricularBeat(
  morphology: Morphology,
  kind: BeatKind,
  qrsScale: number = 1,
  includeT: boolean = true
): BeatLayout {
  const kernels: WaveformKernel[] = [
    { samples: qrsScale === 1 ? morphology.qrs : morphology.qrs.map(v => v * qrsScale), offset: 0 },
  ];
  if (includeT) {
    kernels.push({ samples: morphology.tWave, offset: qtGap(morphology.spec.qrs.duration) });
  }
  return { kernels, qrsOffset: 0, kind };
}
