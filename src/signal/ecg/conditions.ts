/**
 * Cardiac condition strategies
 *
 * Every condition renders into a fresh buffer and reports one annotation
 * per scheduled beat.
 *
 * @module signal/ecg/conditions
 */

import {
  ARRHYTHMIA_DEFAULTS,
  CONDUCTION_DEFAULTS,
  ECG_TIMING,
  ISCHEMIA_DEFAULTS,
} from '../../config/defaults';
import type {
  AnnotatedSignal,
  BeatAnnotation,
  EcgCondition,
  HeartBlockDegree,
  TimeBase,
} from '../../types';
import { InvalidParameterError } from '../../utils/validation';
import { linearRamp, qrsComplex, rectangularPulse } from '../kernels';
import type { PlacementTally } from '../placement';
import type { Random } from '../random';
import { irregularSchedule, regularSchedule } from '../schedule';
import {
  blockedBeat,
  conductedBeat,
  ventricularBeat,
  type BeatLayout,
  type Morphology,
} from './morphology';

/**
 * Validated numeric settings for one rendering pass
 */
export interface EcgSettings {
  /** bpm actually used for sinus schedules */
  heartRate: number;
  /** bpm the caller asked for, if any */
  requestedHeartRate: number | undefined;
  severity: number;
  hrvStd: number;
  pvcFrequency: number;
  afRate: readonly [number, number];
  heartBlockDegree: HeartBlockDegree;
  prProlongation: number;
  escapeRate: number;
}

export interface EcgContext {
  timeBase: TimeBase;
  random: Random;
  tally: PlacementTally;
  morphology: Morphology;
  settings: EcgSettings;
}

export type EcgStrategy = (context: EcgContext) => AnnotatedSignal;

/**
 * Accumulates beats into one buffer
 */
class BeatCanvas {
  readonly signal: number[];
  readonly beats: BeatAnnotation[] = [];

  constructor(private readonly context: EcgContext) {
    this.signal = new Array<number>(context.timeBase.nSamples).fill(0);
  }

  draw(onsets: readonly number[], layoutFor: (index: number) => BeatLayout): this {
    const { samplingRate } = this.context.timeBase;
    onsets.forEach((onset, index) => {
      const layout = layoutFor(index);
      const qrs = layout.qrsOffset === null ? undefined : layout.kernels.find(k => k.offset === layout.qrsOffset);
      let qrsPlaced = false;
      for (const kernel of layout.kernels) {
        const written = this.context.tally.place(
          this.signal,
          kernel.samples,
          Math.round((onset + kernel.offset) * samplingRate)
        );
        if (kernel === qrs && written > 0) qrsPlaced = true;
      }
      this.beats.push({
        onset,
        qrsOnset: qrsPlaced && layout.qrsOffset !== null ? onset + layout.qrsOffset : null,
        kind: layout.kind,
      });
    });
    return this;
  }

  finish(): AnnotatedSignal {
    this.beats.sort((a, b) => a.onset - b.onset);
    return { signal: this.signal, beats: this.beats };
  }
}

function sinusSchedule(context: EcgContext, heartRate: number = context.settings.heartRate): number[] {
  return regularSchedule(context.timeBase, heartRate, context.settings.hrvStd, context.random);
}

/**
 * Sinus rhythm where every beat uses the same layout
 */
function uniformSinus(layout: (context: EcgContext) => BeatLayout): EcgStrategy {
  return context => {
    const beat = layout(context);
    return new BeatCanvas(context).draw(sinusSchedule(context), () => beat).finish();
  };
}

// ============================================================================
// Arrhythmias
// ============================================================================

const pvc: EcgStrategy = context => {
  const { morphology, settings, random } = context;
  const normal = conductedBeat(morphology);
  const ectopic: BeatLayout = {
    kernels: [
      { samples: morphology.qrs.map(v => v * ARRHYTHMIA_DEFAULTS.pvcScale), offset: ECG_TIMING.prInterval },
    ],
    qrsOffset: ECG_TIMING.prInterval,
    kind: 'pvc',
  };
  return new BeatCanvas(context)
    .draw(sinusSchedule(context), () => (random.chance(settings.pvcFrequency) ? ectopic : normal))
    .finish();
};

const atrialFibrillation: EcgStrategy = context => {
  const [minRate, maxRate] = context.settings.afRate;
  const onsets = irregularSchedule(context.timeBase, 60 / maxRate, 60 / minRate, context.random);
  const beat = ventricularBeat(context.morphology, 'fibrillation');
  return new BeatCanvas(context).draw(onsets, () => beat).finish();
};

function rateLimited(kind: 'brady' | 'tachy'): EcgStrategy {
  return context => {
    const requested = context.settings.requestedHeartRate;
    const heartRate = requested ?? (kind === 'brady' ? ARRHYTHMIA_DEFAULTS.bradyRate : ARRHYTHMIA_DEFAULTS.tachyRate);
    if (kind === 'brady' && heartRate >= 60) {
      throw new InvalidParameterError('must be below 60 bpm for bradycardia', 'heartRate', heartRate);
    }
    if (kind === 'tachy' && heartRate <= 100) {
      throw new InvalidParameterError('must be above 100 bpm for tachycardia', 'heartRate', heartRate);
    }
    const beat = conductedBeat(context.morphology);
    return new BeatCanvas(context).draw(sinusSchedule(context, heartRate), () => beat).finish();
  };
}

const heartBlock: EcgStrategy = context => {
  const { morphology, settings } = context;
  const canvas = new BeatCanvas(context);

  switch (settings.heartBlockDegree) {
    case 1: {
      const beat = conductedBeat(morphology, {
        prInterval: ECG_TIMING.prInterval + settings.prProlongation,
      });
      return canvas.draw(sinusSchedule(context), () => beat).finish();
    }
    case 2: {
      const conducted = conductedBeat(morphology);
      const blocked = blockedBeat(morphology);
      return canvas.draw(sinusSchedule(context), i => (i % 2 === 1 ? blocked : conducted)).finish();
    }
    case 3: {
      // Atria and ventricles run on independent clocks
      const blocked = blockedBeat(morphology);
      canvas.draw(sinusSchedule(context), () => blocked);
      const [early, late] = ARRHYTHMIA_DEFAULTS.escapeOnset;
      const escapeOnsets = regularSchedule(
        context.timeBase,
        settings.escapeRate,
        settings.hrvStd,
        context.random,
        context.random.uniform(early, late)
      );
      const escape = ventricularBeat(morphology, 'escape');
      return canvas.draw(escapeOnsets, () => escape).finish();
    }
  }
};

// ============================================================================
// Ischemia
// ============================================================================

/**
 * Constant shift over the ST segment, right after the QRS
 */
function stShift(gain: number): EcgStrategy {
  return uniformSinus(({ morphology, settings, timeBase }) =>
    conductedBeat(morphology, {
      extras: [
        {
          samples: rectangularPulse(gain * settings.severity, ISCHEMIA_DEFAULTS.stDuration, timeBase.samplingRate),
          offset: ECG_TIMING.prInterval + morphology.spec.qrs.duration,
        },
      ],
    })
  );
}

const tWaveInversion = uniformSinus(({ morphology, settings }) =>
  conductedBeat(morphology, { tScale: -settings.severity })
);

const pathologicalQ = uniformSinus(({ morphology, settings, timeBase }) =>
  conductedBeat(morphology, {
    extras: [
      {
        samples: rectangularPulse(
          ISCHEMIA_DEFAULTS.qWaveDepth * settings.severity,
          ISCHEMIA_DEFAULTS.qWaveDuration,
          timeBase.samplingRate
        ),
        offset: ECG_TIMING.prInterval - ISCHEMIA_DEFAULTS.qWaveDuration,
      },
    ],
  })
);

// ============================================================================
// Conduction abnormalities
// ============================================================================

function widenedQrs(
  lobes: readonly [number, number, number],
  widths: { base: number; perSeverity: number }
): EcgStrategy {
  return uniformSinus(({ morphology, settings, timeBase }) => {
    const duration = widths.base + widths.perSeverity * settings.severity;
    const [qAmp, rAmp, sAmp] = lobes;
    return conductedBeat(morphology, {
      qrs: { samples: qrsComplex({ qAmp, rAmp, sAmp, duration }, timeBase.samplingRate), duration },
    });
  });
}

const wolffParkinsonWhite = uniformSinus(({ morphology, settings, timeBase }) => {
  const { wpwPrInterval, deltaWave } = CONDUCTION_DEFAULTS;
  const deltaDuration = deltaWave.duration * settings.severity;
  return conductedBeat(morphology, {
    prInterval: wpwPrInterval + deltaDuration,
    extras: [
      {
        samples: linearRamp(0, deltaWave.amplitude * settings.severity, deltaDuration, timeBase.samplingRate),
        offset: wpwPrInterval,
      },
    ],
  });
});

const normalSinus = uniformSinus(({ morphology }) => conductedBeat(morphology));

export const ECG_STRATEGIES: Record<EcgCondition, EcgStrategy> = {
  normal: normalSinus,
  pvc,
  af: atrialFibrillation,
  brady: rateLimited('brady'),
  tachy: rateLimited('tachy'),
  heart_block: heartBlock,
  st_elevation: stShift(ISCHEMIA_DEFAULTS.stElevation),
  st_depression: stShift(ISCHEMIA_DEFAULTS.stDepression),
  t_wave_inversion: tWaveInversion,
  q_wave: pathologicalQ,
  lbbb: widenedQrs(CONDUCTION_DEFAULTS.lbbbLobes, CONDUCTION_DEFAULTS.bundleBranchQrs),
  rbbb: widenedQrs(CONDUCTION_DEFAULTS.rbbbLobes, CONDUCTION_DEFAULTS.bundleBranchQrs),
  wpw: wolffParkinsonWhite,
  lafb: widenedQrs(CONDUCTION_DEFAULTS.lafbLobes, CONDUCTION_DEFAULTS.lafbQrs),
};
