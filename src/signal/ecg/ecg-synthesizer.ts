/**
 * Single-lead ECG generator
 *
 * @example
 * ```typescript
 * const ecg = new EcgSynthesizer(500, 10);
 * const sinus = ecg.generate({ heartRate: 72, hrvStd: 0.03 });
 * const stemi = ecg.generate({ condition: 'st_elevation', severity: 0.8 });
 * const { beats } = ecg.generateAnnotated({ condition: 'heart_block', heartBlockDegree: 2 });
 * ```
 *
 * @module signal/ecg/ecg-synthesizer
 */

import {
  ARRHYTHMIA_DEFAULTS,
  ECG_DEFAULTS,
  ECG_WAVE_DEFAULTS,
  PARAMETER_RANGES,
} from '../../config/defaults';
import {
  ARRHYTHMIA_TYPES,
  CONDUCTION_TYPES,
  ECG_CONDITIONS,
  ISCHEMIA_TYPES,
} from '../../types';
import type {
  AnnotatedSignal,
  ArrhythmiaType,
  ConductionType,
  EcgCondition,
  EcgParams,
  HeartBlockDegree,
  IschemiaType,
  Signal,
} from '../../types';
import {
  InvalidParameterError,
  requireFinite,
  requireInRange,
  requireNonNegative,
  requireOneOf,
  requirePositive,
  requireUnitInterval,
} from '../../utils/validation';
import { Synthesizer, type SynthesizerOptions } from '../synthesizer';
import { ECG_STRATEGIES, type EcgSettings } from './conditions';
import { buildMorphology, type MorphologySpec } from './morphology';

type ConditionParams = Omit<EcgParams, 'condition'>;

function requireHeartRate(value: number, field: string): number {
  const { min, max } = PARAMETER_RANGES.heartRate;
  return requireInRange(value, field, min, max);
}

function requireDegree(value: number): HeartBlockDegree {
  if (value === 1 || value === 2 || value === 3) return value;
  throw new InvalidParameterError('must be 1, 2 or 3', 'heartBlockDegree', value);
}

export class EcgSynthesizer extends Synthesizer<EcgParams> {
  constructor(samplingRate: number, duration: number, options: SynthesizerOptions = {}) {
    super('ecg', samplingRate, duration, options);
  }

  protected variantOf(params: EcgParams): string {
    return params.condition ?? 'normal';
  }

  protected synthesize(params: EcgParams): Signal {
    return this.render(params).signal;
  }

  /**
   * Signal plus one label per scheduled beat
   */
  generateAnnotated(params: EcgParams = {}): AnnotatedSignal {
    return this.seeded(params, () => this.render(params));
  }

  simulateNormalSinus(params: ConditionParams = {}): Signal {
    return this.conditionSignal('normal', params);
  }

  simulateArrhythmia(type: ArrhythmiaType, params: ConditionParams = {}): Signal {
    return this.conditionSignal(requireOneOf(type, 'arrhythmiaType', ARRHYTHMIA_TYPES), params);
  }

  simulateIschemia(type: IschemiaType, params: ConditionParams = {}): Signal {
    return this.conditionSignal(requireOneOf(type, 'ischemiaType', ISCHEMIA_TYPES), params);
  }

  simulateConductionAbnormality(type: ConductionType, params: ConditionParams = {}): Signal {
    return this.conditionSignal(requireOneOf(type, 'abnormalityType', CONDUCTION_TYPES), params);
  }

  private conditionSignal(condition: EcgCondition, params: ConditionParams): Signal {
    const full: EcgParams = { ...params, condition };
    return this.seeded(full, () => this.render(full).signal);
  }

  private render(params: EcgParams): AnnotatedSignal {
    const condition: EcgCondition = requireOneOf(params.condition ?? 'normal', 'condition', ECG_CONDITIONS);
    const settings = this.resolveSettings(params);
    const morphology = buildMorphology(this.resolveMorphology(params), this.timeBase.samplingRate);
    const tally = this.createTally(this.resolvePolicy(params.boundaryPolicy));

    const result = ECG_STRATEGIES[condition]({
      timeBase: this.timeBase,
      random: this.random,
      tally,
      morphology,
      settings,
    });
    this.reportDropped(tally, condition);
    return result;
  }

  private resolveSettings(params: EcgParams): EcgSettings {
    const requestedHeartRate =
      params.heartRate === undefined ? undefined : requireHeartRate(params.heartRate, 'heartRate');

    const afRate = params.afRate ?? ARRHYTHMIA_DEFAULTS.afRate;
    requireHeartRate(afRate[0], 'afRate[0]');
    requireHeartRate(afRate[1], 'afRate[1]');
    if (afRate[1] < afRate[0]) {
      throw new InvalidParameterError('must be ascending [min, max]', 'afRate', afRate);
    }

    return {
      heartRate: requestedHeartRate ?? ECG_DEFAULTS.heartRate,
      requestedHeartRate,
      severity: requireUnitInterval(params.severity ?? ECG_DEFAULTS.severity, 'severity'),
      hrvStd: requireNonNegative(params.hrvStd ?? ECG_DEFAULTS.hrvStd, 'hrvStd'),
      pvcFrequency: requireUnitInterval(params.pvcFrequency ?? ARRHYTHMIA_DEFAULTS.pvcFrequency, 'pvcFrequency'),
      afRate: [afRate[0], afRate[1]],
      heartBlockDegree: requireDegree(params.heartBlockDegree ?? ARRHYTHMIA_DEFAULTS.heartBlockDegree),
      prProlongation: requireNonNegative(
        params.prProlongation ?? ARRHYTHMIA_DEFAULTS.prProlongation,
        'prProlongation'
      ),
      escapeRate: requireHeartRate(params.escapeRate ?? ARRHYTHMIA_DEFAULTS.escapeRate, 'escapeRate'),
    };
  }

  private resolveMorphology(params: EcgParams): MorphologySpec {
    const pWave = { ...ECG_WAVE_DEFAULTS.pWave, ...params.pWave };
    const qrs = { ...ECG_WAVE_DEFAULTS.qrs, ...params.qrs };
    const tWave = { ...ECG_WAVE_DEFAULTS.tWave, ...params.tWave };

    return {
      pWave: {
        amplitude: requireFinite(pWave.amplitude, 'pWave.amplitude'),
        duration: requirePositive(pWave.duration, 'pWave.duration'),
      },
      qrs: {
        qAmp: requireFinite(qrs.qAmp, 'qrs.qAmp'),
        rAmp: requireFinite(qrs.rAmp, 'qrs.rAmp'),
        sAmp: requireFinite(qrs.sAmp, 'qrs.sAmp'),
        duration: requirePositive(qrs.duration, 'qrs.duration'),
      },
      tWave: {
        amplitude: requireFinite(tWave.amplitude, 'tWave.amplitude'),
        duration: requirePositive(tWave.duration, 'tWave.duration'),
      },
    };
  }
}
